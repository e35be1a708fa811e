import {OidcExchangeSchema, type OidcExchange} from '@ovpn-portal/schemas';

export type OidcExchangeStore = {
  save: (exchange: OidcExchange) => Promise<void>;
  // Atomic check-and-delete: among concurrent callers presenting the same state, at most one receives the exchange.
  consume: (stateId: string) => Promise<OidcExchange | null>;
};

export class InMemoryOidcExchangeStore implements OidcExchangeStore {
  private readonly exchanges = new Map<string, OidcExchange>();

  public constructor(private readonly now: () => Date = () => new Date()) {}

  public async save(exchange: OidcExchange): Promise<void> {
    const parsed = await OidcExchangeSchema.parseAsync(exchange);
    this.purgeExpired();
    if (this.exchanges.has(parsed.stateId)) {
      throw new Error('oidc_exchange_state_collision');
    }

    this.exchanges.set(parsed.stateId, parsed);
  }

  public consume(stateId: string): Promise<OidcExchange | null> {
    const exchange = this.exchanges.get(stateId);
    if (!exchange) {
      return Promise.resolve(null);
    }

    this.exchanges.delete(stateId);
    return Promise.resolve(this.isExpired(exchange) ? null : exchange);
  }

  // Abandoned logins are never consumed, so each save sweeps what has lapsed.
  private purgeExpired() {
    for (const [stateId, exchange] of this.exchanges) {
      if (this.isExpired(exchange)) {
        this.exchanges.delete(stateId);
      }
    }
  }

  private isExpired(exchange: OidcExchange) {
    return Date.parse(exchange.expiresAt) <= this.now().getTime();
  }

  public get size() {
    return this.exchanges.size;
  }
}
