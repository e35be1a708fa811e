import 'reflect-metadata'
import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'
import type {FetchLike} from '@ovpn-portal/auth'
import {createStructuredLogger, type StructuredLogger, type StructuredLogWriter} from '@ovpn-portal/logging'

import type {CertificateAuthority} from './certificateIssuer'
import type {ServiceConfig} from './config'
import {createProcessInfrastructure, type ProcessInfrastructure} from './infrastructure'
import {createDecodeErrorHandler, createPathEncodingGuard} from './nest/pathEncodingMiddleware'
import {PortalNestModule} from './nest/portalNestModule'
import {createServiceRouterMiddleware} from './nest/serviceRouterMiddleware'
import {createPortalServices} from './services'

export type CreatePortalAppOptions = {
  config: ServiceConfig
  fetchImpl?: FetchLike
  authority?: CertificateAuthority
  infrastructure?: ProcessInfrastructure
  logWriter?: StructuredLogWriter
  now?: () => Date
}

const createLogger = ({config, logWriter}: Pick<CreatePortalAppOptions, 'config' | 'logWriter'>): StructuredLogger =>
  createStructuredLogger({
    service: config.service.name,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys,
    ...(logWriter ? {writer: logWriter} : {})
  })

export const createPortalApp = async ({
  config,
  fetchImpl,
  authority,
  infrastructure: providedInfrastructure,
  logWriter,
  now
}: CreatePortalAppOptions) => {
  const infrastructure = providedInfrastructure ?? (await createProcessInfrastructure({config, ...(now ? {now} : {})}))

  try {
    const logger = createLogger({config, logWriter})
    const services = createPortalServices({
      config,
      infrastructure,
      logger,
      ...(fetchImpl ? {fetchImpl} : {}),
      ...(authority ? {authority} : {}),
      ...(now ? {now} : {})
    })

    const expressApp = express()
    expressApp.disable('x-powered-by')
    expressApp.use(
      helmet({
        contentSecurityPolicy: {
          useDefaults: false,
          directives: {
            defaultSrc: ["'self'"],
            scriptSrc: ["'self'"],
            frameAncestors: ["'none'"]
          }
        },
        frameguard: {action: 'deny'},
        referrerPolicy: {policy: 'no-referrer'}
      })
    )
    expressApp.use(createPathEncodingGuard({logger}))
    expressApp.use(createServiceRouterMiddleware({config, logger}))

    const nestApp = await NestFactory.create(
      PortalNestModule.register({
        config,
        services,
        logger
      }),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
      }
    )

    await nestApp.init()
    expressApp.use(createDecodeErrorHandler({logger}))

    const server = nestApp.getHttpServer()

    const start = async () => {
      await nestApp.listen(config.port, config.host)
    }

    const stop = async () => {
      await nestApp.close()
      await infrastructure.close()
    }

    return {
      server,
      start,
      stop,
      services,
      infrastructure,
      logger
    }
  } catch (error) {
    await infrastructure.close()
    throw error
  }
}

export type PortalApp = Awaited<ReturnType<typeof createPortalApp>>
