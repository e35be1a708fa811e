import crypto from 'node:crypto';

import {SessionRecordSchema, type SessionRecord} from '@ovpn-portal/schemas';

import {createOpaqueToken, hashToken} from './tokens';
import type {AuthenticatedIdentity} from './types';

const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43,128}$/u;

export type SessionStore = {
  save: (session: SessionRecord) => Promise<void>;
  findByTokenHash: (tokenHash: string) => Promise<SessionRecord | null>;
  deleteByTokenHash: (tokenHash: string) => Promise<void>;
};

export type SessionResolution =
  | {status: 'authenticated'; session: SessionRecord}
  | {status: 'missing'}
  | {status: 'expired'};

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();

  public async save(session: SessionRecord): Promise<void> {
    const parsed = await SessionRecordSchema.parseAsync(session);
    this.sessions.set(parsed.tokenHash, parsed);
  }

  public findByTokenHash(tokenHash: string): Promise<SessionRecord | null> {
    return Promise.resolve(this.sessions.get(tokenHash) ?? null);
  }

  public deleteByTokenHash(tokenHash: string): Promise<void> {
    this.sessions.delete(tokenHash);
    return Promise.resolve();
  }

  public get size() {
    return this.sessions.size;
  }
}

export type SessionManagerOptions = {
  store: SessionStore;
  ttlSeconds: number;
  now?: () => Date;
};

export class SessionManager {
  private readonly now: () => Date;

  public constructor(private readonly options: SessionManagerOptions) {
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new Error('session_ttl_invalid');
    }

    this.now = options.now ?? (() => new Date());
  }

  public async create({
    identity,
    idToken
  }: {
    identity: AuthenticatedIdentity;
    idToken?: string;
  }): Promise<{token: string; session: SessionRecord}> {
    const issuedAt = this.now();
    const token = createOpaqueToken({bytes: 32});
    const session = SessionRecordSchema.parse({
      sessionId: crypto.randomUUID(),
      tokenHash: hashToken(token),
      subject: identity.subject,
      displayName: identity.displayName,
      ...(identity.email ? {email: identity.email} : {}),
      groups: identity.groups,
      roles: identity.roles,
      issuedAt: issuedAt.toISOString(),
      expiresAt: new Date(issuedAt.getTime() + this.options.ttlSeconds * 1000).toISOString(),
      csrfSecret: crypto.randomBytes(32).toString('base64url'),
      ...(idToken ? {idToken} : {}),
      status: 'active'
    });

    await this.options.store.save(session);
    return {token, session};
  }

  public async resolve(token: string | undefined): Promise<SessionResolution> {
    if (!token || !TOKEN_PATTERN.test(token)) {
      return {status: 'missing'};
    }

    const tokenHash = hashToken(token);
    const session = await this.options.store.findByTokenHash(tokenHash);
    if (!session) {
      return {status: 'missing'};
    }

    if (new Date(session.expiresAt).getTime() <= this.now().getTime()) {
      await this.options.store.deleteByTokenHash(tokenHash);
      return {status: 'expired'};
    }

    return {status: 'authenticated', session};
  }

  public async markLogoutPending(session: SessionRecord): Promise<SessionRecord> {
    const updated: SessionRecord = {...session, status: 'logout_pending'};
    await this.options.store.save(updated);
    return updated;
  }

  public async destroy(token: string | undefined): Promise<void> {
    if (!token || !TOKEN_PATTERN.test(token)) {
      return;
    }

    await this.options.store.deleteByTokenHash(hashToken(token));
  }
}
