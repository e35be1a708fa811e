import 'reflect-metadata'

import {createStructuredLogger} from '@ovpn-portal/logging'

import {createPortalApp} from './app'
import {loadConfig} from './config'

export const appName = 'ovpn-portal'

// Used before configuration exists, so the environment name is read raw.
const reportStartupFailure = (error: unknown) => {
  const nodeEnv = process.env.NODE_ENV ?? 'development'
  createStructuredLogger({service: appName, env: nodeEnv, level: 'error'}).fatal({
    event: 'process.startup.failed',
    component: 'process.entrypoint',
    message: 'Portal startup failed',
    reason_code: 'startup_failed',
    metadata: {error}
  })
}

const run = async () => {
  const config = loadConfig(process.env)
  const app = await createPortalApp({config})
  await app.start()

  app.logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: `Listening on ${config.host}:${config.port}`,
    metadata: {mode: config.service.mode, ca_mode: config.certificateIssuer.mode}
  })

  let stopping = false
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return
    }
    stopping = true
    app.logger.info({event: 'process.stopping', component: 'process.entrypoint', metadata: {signal}})
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        app.logger.error({event: 'process.stop.failed', component: 'process.entrypoint', metadata: {error}})
        process.exit(1)
      }
    )
  }

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)
}

run().catch((error: unknown) => {
  reportStartupFailure(error)
  process.exit(1)
})
