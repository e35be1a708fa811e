import {randomUUID} from 'node:crypto';

import type {OidcExchange, SessionRecord} from '@ovpn-portal/schemas';
import {describe, expect, it} from 'vitest';

import {DbRepositoryError} from '../errors.js';
import {createAuthRedisStores} from '../redis/authRedisAdapters.js';
import type {RedisClient, RedisSetOptions} from '../redis/types.js';

class FakeRedis implements RedisClient {
  public readonly store = new Map<string, {value: string; expiresAt?: number}>();
  public readonly ttls = new Map<string, number>();

  public get(key: string): string | null {
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  public set(key: string, value: string, options?: RedisSetOptions): 'OK' | null {
    const now = Date.now();
    const existing = this.store.get(key);
    const hasExisting = existing !== undefined && (existing.expiresAt === undefined || existing.expiresAt > now);

    if (options?.NX && hasExisting) {
      return null;
    }

    const expiresAt = options?.EX !== undefined ? now + options.EX * 1000 : undefined;
    if (options?.EX !== undefined) {
      this.ttls.set(key, options.EX);
    }
    this.store.set(key, {value, expiresAt});
    return 'OK';
  }

  public del(...keys: string[]): number {
    let removed = 0;
    for (const key of keys) {
      if (this.store.delete(key)) {
        removed += 1;
      }
    }
    return removed;
  }

  public getDel(key: string): string | null {
    const value = this.get(key);
    this.store.delete(key);
    return value;
  }
}

const NOW = new Date('2026-02-11T00:00:00.000Z');

const buildSession = (overrides: Partial<SessionRecord> = {}): SessionRecord => ({
  sessionId: randomUUID(),
  tokenHash: 'a'.repeat(64),
  subject: 'user-123',
  displayName: 'Test User',
  groups: ['staff'],
  roles: ['user'],
  issuedAt: '2026-02-11T00:00:00.000Z',
  expiresAt: '2026-02-11T01:00:00.000Z',
  csrfSecret: 'test-secret-test-secret-test-secret-0001',
  status: 'active',
  ...overrides
});

const buildExchange = (overrides: Partial<OidcExchange> = {}): OidcExchange => ({
  stateId: 's'.repeat(43),
  nonce: 'n'.repeat(43),
  codeVerifier: 'v'.repeat(64),
  codeChallenge: 'c'.repeat(43),
  redirectTarget: '/profile',
  createdAt: '2026-02-11T00:00:00.000Z',
  expiresAt: '2026-02-11T00:10:00.000Z',
  ...overrides
});

describe('auth redis adapters', () => {
  it('stores sessions under the token hash with a ttl matching the expiry', async () => {
    const redis = new FakeRedis();
    const {sessionStore} = createAuthRedisStores({redisClient: redis, keyPrefix: 'test:auth', now: () => NOW});
    const session = buildSession();

    await sessionStore.save(session);

    expect(redis.ttls.get(`test:auth:sess:token:${session.tokenHash}`)).toBe(3600);
    await expect(sessionStore.findByTokenHash(session.tokenHash)).resolves.toEqual(session);
  });

  it('drops sessions that have expired even if the key lingers', async () => {
    const redis = new FakeRedis();
    let now = NOW;
    const {sessionStore} = createAuthRedisStores({redisClient: redis, now: () => now});
    const session = buildSession();
    await sessionStore.save(session);

    now = new Date('2026-02-11T01:00:00.000Z');

    await expect(sessionStore.findByTokenHash(session.tokenHash)).resolves.toBeNull();
    expect(redis.store.size).toBe(0);
  });

  it('deletes sessions by token hash', async () => {
    const redis = new FakeRedis();
    const {sessionStore} = createAuthRedisStores({redisClient: redis, now: () => NOW});
    const session = buildSession();
    await sessionStore.save(session);

    await sessionStore.deleteByTokenHash(session.tokenHash);

    await expect(sessionStore.findByTokenHash(session.tokenHash)).resolves.toBeNull();
  });

  it('rejects malformed token hashes and already expired sessions', async () => {
    const {sessionStore} = createAuthRedisStores({redisClient: new FakeRedis(), now: () => NOW});

    await expect(sessionStore.findByTokenHash('not-a-hash')).rejects.toBeInstanceOf(DbRepositoryError);
    await expect(sessionStore.save(buildSession({expiresAt: '2026-02-11T00:00:00.000Z'}))).rejects.toThrow(
      'expiresAt must be in the future'
    );
  });

  it('rejects corrupted session payloads', async () => {
    const redis = new FakeRedis();
    const {sessionStore} = createAuthRedisStores({redisClient: redis, now: () => NOW});
    redis.set(`ovpn-portal:auth:sess:token:${'b'.repeat(64)}`, '{not json');

    await expect(sessionStore.findByTokenHash('b'.repeat(64))).rejects.toThrow('Invalid session cache entry payload');
  });

  it('consumes an exchange exactly once', async () => {
    const redis = new FakeRedis();
    const {exchangeStore} = createAuthRedisStores({redisClient: redis, now: () => NOW});
    const exchange = buildExchange();
    await exchangeStore.save(exchange);

    const results = await Promise.all([exchangeStore.consume(exchange.stateId), exchangeStore.consume(exchange.stateId)]);

    expect(results.filter(result => result !== null)).toEqual([exchange]);
    expect(redis.ttls.get(`ovpn-portal:auth:oidc:state:${exchange.stateId}`)).toBe(600);
  });

  it('refuses to overwrite an outstanding state', async () => {
    const {exchangeStore} = createAuthRedisStores({redisClient: new FakeRedis(), now: () => NOW});
    await exchangeStore.save(buildExchange());

    await expect(exchangeStore.save(buildExchange())).rejects.toMatchObject({code: 'conflict'});
  });

  it('treats expired exchanges as absent', async () => {
    const redis = new FakeRedis();
    let now = NOW;
    const {exchangeStore} = createAuthRedisStores({redisClient: redis, now: () => now});
    const exchange = buildExchange();
    await exchangeStore.save(exchange);

    now = new Date('2026-02-11T00:10:00.000Z');

    await expect(exchangeStore.consume(exchange.stateId)).resolves.toBeNull();
    await expect(exchangeStore.consume('')).resolves.toBeNull();
  });
});
