import type {OidcExchange} from '@ovpn-portal/schemas';
import {describe, expect, it} from 'vitest';

import {InMemoryOidcExchangeStore, createNonce, createOpaqueToken, createPkcePair} from '../index';

const buildExchange = (overrides: Partial<OidcExchange> = {}): OidcExchange => {
  const pkce = createPkcePair();
  return {
    stateId: createOpaqueToken(),
    nonce: createNonce(),
    codeVerifier: pkce.codeVerifier,
    codeChallenge: pkce.codeChallenge,
    redirectTarget: '/profile',
    createdAt: '2026-03-01T10:00:00.000Z',
    expiresAt: '2026-03-01T10:10:00.000Z',
    ...overrides
  };
};

describe('InMemoryOidcExchangeStore', () => {
  it('hands an exchange to exactly one of several concurrent consumers', async () => {
    const store = new InMemoryOidcExchangeStore(() => new Date('2026-03-01T10:05:00.000Z'));
    const exchange = buildExchange();
    await store.save(exchange);

    const results = await Promise.all(Array.from({length: 8}, () => store.consume(exchange.stateId)));

    expect(results.filter(result => result !== null)).toEqual([exchange]);
    expect(store.size).toBe(0);
  });

  it('returns null for expired exchanges and drops them', async () => {
    const store = new InMemoryOidcExchangeStore(() => new Date('2026-03-01T10:10:00.000Z'));
    const exchange = buildExchange();
    await store.save(exchange);

    await expect(store.consume(exchange.stateId)).resolves.toBeNull();
    expect(store.size).toBe(0);
  });

  it('refuses to overwrite an outstanding state', async () => {
    const store = new InMemoryOidcExchangeStore(() => new Date('2026-03-01T10:05:00.000Z'));
    const exchange = buildExchange();
    await store.save(exchange);

    await expect(store.save(buildExchange({stateId: exchange.stateId}))).rejects.toThrow(
      'oidc_exchange_state_collision'
    );
  });

  it('sweeps abandoned exchanges once they lapse', async () => {
    let now = new Date('2026-03-01T10:00:00.000Z');
    const store = new InMemoryOidcExchangeStore(() => now);
    await store.save(buildExchange());
    await store.save(buildExchange());
    expect(store.size).toBe(2);

    now = new Date('2026-03-01T10:20:00.000Z');
    const fresh = buildExchange({createdAt: '2026-03-01T10:20:00.000Z', expiresAt: '2026-03-01T10:30:00.000Z'});
    await store.save(fresh);

    expect(store.size).toBe(1);
    await expect(store.consume(fresh.stateId)).resolves.toEqual(fresh);
  });

    it('rejects malformed exchanges', async () => {
    const store = new InMemoryOidcExchangeStore();

    await expect(store.save(buildExchange({codeVerifier: 'short'}))).rejects.toThrow();
  });
});
