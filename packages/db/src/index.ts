export * from './contracts.js';
export * from './database.js';
export * from './errors.js';
export * from './repositories/index.js';
export * from './schema.js';
export {escapeLikePattern} from './utils.js';
export {
  createAuthRedisStores,
  type RedisOidcExchangeStore,
  type RedisSessionStore
} from './redis/authRedisAdapters.js';
export type {RedisClient, RedisSetOptions} from './redis/types.js';
