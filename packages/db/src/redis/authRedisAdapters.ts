import {
  OidcExchangeSchema,
  SessionRecordSchema,
  TokenHashSchema,
  type OidcExchange,
  type SessionRecord
} from '@ovpn-portal/schemas';
import type {z} from 'zod';

import {DbRepositoryError} from '../errors.js';
import type {RedisClient} from './types.js';

type AuthRedisAdapterOptions = {
  redisClient: RedisClient;
  keyPrefix?: string;
  now?: () => Date;
};

export type RedisSessionStore = {
  save: (session: SessionRecord) => Promise<void>;
  findByTokenHash: (tokenHash: string) => Promise<SessionRecord | null>;
  deleteByTokenHash: (tokenHash: string) => Promise<void>;
};

export type RedisOidcExchangeStore = {
  save: (exchange: OidcExchange) => Promise<void>;
  consume: (stateId: string) => Promise<OidcExchange | null>;
};

const normalizeKeyPrefix = (prefix?: string): string => {
  const trimmed = prefix?.trim();
  if (!trimmed) {
    return 'ovpn-portal:auth:';
  }

  return trimmed.endsWith(':') ? trimmed : `${trimmed}:`;
};

const parseExpiresAt = (value: string, fieldName: string): Date => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new DbRepositoryError('validation_error', `${fieldName} must be a valid ISO timestamp`);
  }

  return parsed;
};

const computeTtlSeconds = (expiresAt: Date, now: Date, fieldName: string): number => {
  const ttlMs = expiresAt.getTime() - now.getTime();
  if (ttlMs <= 0) {
    throw new DbRepositoryError('validation_error', `${fieldName} must be in the future`);
  }

  return Math.max(1, Math.ceil(ttlMs / 1000));
};

const sessionTokenKey = (prefix: string, tokenHash: string): string => `${prefix}sess:token:${tokenHash}`;
const exchangeKey = (prefix: string, stateId: string): string => `${prefix}oidc:state:${stateId}`;

const parseCacheEntry = <TSchema extends z.ZodType>(schema: TSchema, value: string, label: string): z.infer<TSchema> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new DbRepositoryError('validation_error', `Invalid ${label} cache entry payload`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DbRepositoryError('validation_error', `Invalid ${label} cache entry payload`);
  }

  return result.data;
};

const assertTokenHash = (tokenHash: string) => {
  const parsed = TokenHashSchema.safeParse(tokenHash);
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', 'tokenHash must be a 64-char lowercase hex string');
  }

  return parsed.data;
};

export const createAuthRedisStores = ({
  redisClient,
  keyPrefix,
  now
}: AuthRedisAdapterOptions): {
  sessionStore: RedisSessionStore;
  exchangeStore: RedisOidcExchangeStore;
} => {
  const prefix = normalizeKeyPrefix(keyPrefix);
  const nowProvider = now ?? (() => new Date());

  return {
    sessionStore: {
      save: async session => {
        const parsedSession = SessionRecordSchema.parse(session);
        const expiresAt = parseExpiresAt(parsedSession.expiresAt, 'expiresAt');
        const ttlSeconds = computeTtlSeconds(expiresAt, nowProvider(), 'expiresAt');

        const result = await redisClient.set(
          sessionTokenKey(prefix, parsedSession.tokenHash),
          JSON.stringify(parsedSession),
          {EX: ttlSeconds}
        );
        if (!result) {
          throw new DbRepositoryError('unexpected_error', 'Failed to persist session record');
        }
      },
      findByTokenHash: async tokenHash => {
        const tokenKey = sessionTokenKey(prefix, assertTokenHash(tokenHash));
        const payload = await redisClient.get(tokenKey);
        if (!payload) {
          return null;
        }

        const record = parseCacheEntry(SessionRecordSchema, payload, 'session');
        if (parseExpiresAt(record.expiresAt, 'expiresAt').getTime() <= nowProvider().getTime()) {
          await redisClient.del(tokenKey);
          return null;
        }

        return record;
      },
      deleteByTokenHash: async tokenHash => {
        await redisClient.del(sessionTokenKey(prefix, assertTokenHash(tokenHash)));
      }
    },
    exchangeStore: {
      save: async exchange => {
        const parsedExchange = OidcExchangeSchema.parse(exchange);
        const expiresAt = parseExpiresAt(parsedExchange.expiresAt, 'expiresAt');
        const ttlSeconds = computeTtlSeconds(expiresAt, nowProvider(), 'expiresAt');

        const result = await redisClient.set(exchangeKey(prefix, parsedExchange.stateId), JSON.stringify(parsedExchange), {
          EX: ttlSeconds,
          NX: true
        });
        if (!result) {
          throw new DbRepositoryError('conflict', 'OIDC exchange state already exists');
        }
      },
      consume: async stateId => {
        const normalized = stateId.trim();
        if (normalized.length === 0 || normalized.length > 128) {
          return null;
        }

        // GETDEL makes consumption single-use even across service instances.
        const payload = await redisClient.getDel(exchangeKey(prefix, normalized));
        if (!payload) {
          return null;
        }

        const exchange = parseCacheEntry(OidcExchangeSchema, payload, 'OIDC exchange');
        if (parseExpiresAt(exchange.expiresAt, 'expiresAt').getTime() <= nowProvider().getTime()) {
          return null;
        }

        return exchange;
      }
    }
  };
};
