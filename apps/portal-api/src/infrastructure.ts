import {
  InMemoryOidcExchangeStore,
  InMemorySessionStore,
  type OidcExchangeStore,
  type SessionStore
} from '@ovpn-portal/auth'
import {
  createAuthRedisStores,
  createPortalDatabase,
  InMemoryCertificateRepository,
  InMemoryPskRepository,
  PostgresCertificateRepository,
  PostgresPskRepository,
  type CertificateRepository,
  type PskRepository,
  type RedisClient
} from '@ovpn-portal/db'
import {Pool} from 'pg'
import {createClient} from 'redis'

import type {ServiceConfig} from './config'

export type PortalRedisClient = ReturnType<typeof createClient>

export type ProcessInfrastructure = {
  enabled: boolean
  certificateRepository: CertificateRepository
  pskRepository: PskRepository
  sessionStore: SessionStore
  exchangeStore: OidcExchangeStore
  close: () => Promise<void>
}

// node-redis replies are wider than the store contract; narrow them here.
export const toRedisClient = (redis: PortalRedisClient): RedisClient => ({
  get: key => redis.get(key),
  set: async (key, value, options) => {
    const reply =
      options?.EX !== undefined
        ? await redis.set(key, value, options.NX ? {EX: options.EX, NX: true} : {EX: options.EX})
        : await redis.set(key, value, options?.NX ? {NX: true} : {})
    return reply === 'OK' ? 'OK' : null
  },
  del: (...keys) => redis.del(keys),
  getDel: key => redis.getDel(key)
})

const createDisabledInfrastructure = ({now}: {now?: () => Date}): ProcessInfrastructure => ({
  enabled: false,
  certificateRepository: new InMemoryCertificateRepository(),
  pskRepository: new InMemoryPskRepository(),
  sessionStore: new InMemorySessionStore(),
  exchangeStore: new InMemoryOidcExchangeStore(now),
  close: () => Promise.resolve()
})

export const createProcessInfrastructure = async ({
  config,
  now
}: {
  config: ServiceConfig
  now?: () => Date
}): Promise<ProcessInfrastructure> => {
  if (!config.infrastructure.enabled) {
    return createDisabledInfrastructure({now})
  }

  if (!config.infrastructure.databaseUrl || !config.infrastructure.redisUrl) {
    throw new Error('Infrastructure is enabled but PORTAL_DATABASE_URL or PORTAL_REDIS_URL is missing')
  }

  const pool = new Pool({connectionString: config.infrastructure.databaseUrl})
  const redis = createClient({
    url: config.infrastructure.redisUrl,
    socket: {
      connectTimeout: config.infrastructure.redisConnectTimeoutMs
    }
  })

  try {
    await Promise.all([pool.query('select 1'), redis.connect()])
  } catch (error) {
    await Promise.allSettled([pool.end(), redis.quit()])
    throw error
  }

  const db = createPortalDatabase(pool)
  const {sessionStore, exchangeStore} = createAuthRedisStores({
    redisClient: toRedisClient(redis),
    keyPrefix: config.infrastructure.redisKeyPrefix,
    ...(now ? {now} : {})
  })

  return {
    enabled: true,
    certificateRepository: new PostgresCertificateRepository(db),
    pskRepository: new PostgresPskRepository(db),
    sessionStore,
    exchangeStore,
    close: async () => {
      await Promise.allSettled([pool.end(), redis.quit()])
    }
  }
}
