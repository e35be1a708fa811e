import {createLocalJWKSet, type JWTPayload} from 'jose';
import {z} from 'zod';

import type {OidcExchange} from '@ovpn-portal/schemas';

import {AuthFlowError, isAuthFlowError, type AuthFlowErrorCode} from './errors';
import type {OidcExchangeStore} from './exchangeStore';
import {
  JsonWebKeySetSchema,
  ProviderMetadataSchema,
  extractIdentityClaims,
  normalizeIssuer,
  verifyIdToken,
  type OidcJwtKeyResolver,
  type ProviderMetadata
} from './oidc';
import {createPkcePair} from './pkce';
import {createNonce, createOpaqueToken, timingSafeEqualStrings} from './tokens';
import type {AuthenticatedIdentity, FetchLike} from './types';

export type OidcFlowState = 'unauthenticated' | 'redirect_issued' | 'callback_pending' | 'authenticated' | 'auth_failed';

export type OidcFlowTransition = {
  from: OidcFlowState;
  to: OidcFlowState;
  reason?: AuthFlowErrorCode;
};

export type ProviderEndpointOverrides = Partial<
  Pick<ProviderMetadata, 'authorization_endpoint' | 'token_endpoint' | 'jwks_uri' | 'end_session_endpoint'>
>;

export type OidcRelyingPartyOptions = {
  issuer: string;
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  scope: string;
  groupsClaim: string;
  adminGroup: string;
  exchangeTtlSeconds: number;
  httpTimeoutMs: number;
  clockToleranceSeconds?: number;
  exchangeStore: OidcExchangeStore;
  endpointOverrides?: ProviderEndpointOverrides;
  fetch?: FetchLike;
  now?: () => Date;
  onTransition?: (transition: OidcFlowTransition) => void;
};

export type BeginLoginResult = {
  state: 'redirect_issued';
  stateId: string;
  authorizationUrl: string;
};

export type CompleteLoginInput = {
  state?: string;
  code?: string;
  error?: string;
  errorDescription?: string;
};

export type LoginOutcome =
  | {
      state: 'authenticated';
      identity: AuthenticatedIdentity;
      redirectTarget: string;
      idToken: string;
    }
  | {
      state: 'auth_failed';
      reason: AuthFlowErrorCode;
      message: string;
    };

const TokenResponseSchema = z
  .object({
    id_token: z.string().min(1),
    token_type: z.string().optional()
  })
  .loose();

const MAX_STATE_LENGTH = 128;
const MAX_CODE_LENGTH = 2048;
const MAX_REDIRECT_TARGET_LENGTH = 2048;
const SAFE_REDIRECT_BASE = 'http://portal.invalid';

// Same-origin relative paths only; protocol-relative and backslash forms are rejected.
export const sanitizeRedirectTarget = (value: string | undefined | null) => {
  if (!value || value.length > MAX_REDIRECT_TARGET_LENGTH) {
    return '/';
  }

  if (!value.startsWith('/') || value.startsWith('//') || value.includes('\\') || /[\u0000-\u001f]/u.test(value)) {
    return '/';
  }

  try {
    const parsed = new URL(value, SAFE_REDIRECT_BASE);
    if (parsed.origin !== SAFE_REDIRECT_BASE) {
      return '/';
    }

    return `${parsed.pathname}${parsed.search}${parsed.hash}`;
  } catch {
    return '/';
  }
};

const isTimeoutError = (error: unknown) =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');

export class OidcRelyingParty {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private metadata: Promise<ProviderMetadata> | null = null;
  private keyResolver: Promise<OidcJwtKeyResolver> | null = null;

  public constructor(private readonly options: OidcRelyingPartyOptions) {
    if (!Number.isInteger(options.exchangeTtlSeconds) || options.exchangeTtlSeconds <= 0) {
      throw new Error('oidc_exchange_ttl_invalid');
    }

    if (!Number.isInteger(options.httpTimeoutMs) || options.httpTimeoutMs <= 0) {
      throw new Error('oidc_http_timeout_invalid');
    }

    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  public async beginLogin({redirectTarget}: {redirectTarget?: string | null}): Promise<BeginLoginResult> {
    const metadata = await this.discover();
    const createdAt = this.now();
    const pkce = createPkcePair();
    const exchange: OidcExchange = {
      stateId: createOpaqueToken({bytes: 32}),
      nonce: createNonce(),
      codeVerifier: pkce.codeVerifier,
      codeChallenge: pkce.codeChallenge,
      redirectTarget: sanitizeRedirectTarget(redirectTarget),
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.options.exchangeTtlSeconds * 1000).toISOString()
    };

    await this.options.exchangeStore.save(exchange);

    const authorizationUrl = new URL(metadata.authorization_endpoint);
    authorizationUrl.searchParams.set('client_id', this.options.clientId);
    authorizationUrl.searchParams.set('redirect_uri', this.options.redirectUri);
    authorizationUrl.searchParams.set('response_type', 'code');
    authorizationUrl.searchParams.set('scope', this.options.scope);
    authorizationUrl.searchParams.set('state', exchange.stateId);
    authorizationUrl.searchParams.set('nonce', exchange.nonce);
    authorizationUrl.searchParams.set('code_challenge', exchange.codeChallenge);
    authorizationUrl.searchParams.set('code_challenge_method', pkce.codeChallengeMethod);

    this.transition({from: 'unauthenticated', to: 'redirect_issued'});
    return {state: 'redirect_issued', stateId: exchange.stateId, authorizationUrl: authorizationUrl.toString()};
  }

  public async completeLogin(input: CompleteLoginInput): Promise<LoginOutcome> {
    this.transition({from: 'redirect_issued', to: 'callback_pending'});

    try {
      const outcome = await this.runCallback(input);
      this.transition({from: 'callback_pending', to: 'authenticated'});
      return outcome;
    } catch (error) {
      if (!isAuthFlowError(error)) {
        throw error;
      }

      this.transition({from: 'callback_pending', to: 'auth_failed', reason: error.code});
      return {state: 'auth_failed', reason: error.code, message: error.message};
    }
  }

  public async buildLogoutUrl({
    idTokenHint,
    postLogoutRedirectUri
  }: {
    idTokenHint?: string;
    postLogoutRedirectUri: string;
  }): Promise<string | null> {
    const metadata = await this.discover();
    if (!metadata.end_session_endpoint) {
      return null;
    }

    const logoutUrl = new URL(metadata.end_session_endpoint);
    if (idTokenHint) {
      logoutUrl.searchParams.set('id_token_hint', idTokenHint);
    }
    logoutUrl.searchParams.set('client_id', this.options.clientId);
    logoutUrl.searchParams.set('post_logout_redirect_uri', postLogoutRedirectUri);
    return logoutUrl.toString();
  }

  public discover(): Promise<ProviderMetadata> {
    if (!this.metadata) {
      const pending = this.loadMetadata();
      this.metadata = pending;
      void pending.catch(() => {
        if (this.metadata === pending) {
          this.metadata = null;
        }
      });
    }

    return this.metadata;
  }

  private async runCallback({state, code, error, errorDescription}: CompleteLoginInput) {
    const stateId = state?.trim();
    if (!stateId || stateId.length > MAX_STATE_LENGTH) {
      throw new AuthFlowError('invalid_state', 'Login state is missing or malformed');
    }

    // The state is consumed before anything else so that a provider error still burns it.
    const exchange = await this.options.exchangeStore.consume(stateId);

    if (error) {
      const description = errorDescription?.slice(0, 200);
      throw new AuthFlowError(
        'provider_rejected',
        description ? `Identity provider returned ${error}: ${description}` : `Identity provider returned ${error}`
      );
    }

    if (!exchange) {
      throw new AuthFlowError('invalid_state', 'Login state is unknown, expired or already used');
    }

    const authorizationCode = code?.trim();
    if (!authorizationCode || authorizationCode.length > MAX_CODE_LENGTH) {
      throw new AuthFlowError('malformed_input', 'Authorization code is missing or malformed');
    }

    const metadata = await this.discover();
    const idToken = await this.redeemCode({metadata, exchange, authorizationCode});
    const payload = await this.verify({metadata, idToken});

    const nonce = typeof payload.nonce === 'string' ? payload.nonce : '';
    if (!timingSafeEqualStrings(nonce, exchange.nonce)) {
      throw new AuthFlowError('nonce_mismatch', 'ID token nonce does not match the login request');
    }

    const extracted = extractIdentityClaims({
      payload,
      groupsClaim: this.options.groupsClaim,
      adminGroup: this.options.adminGroup
    });
    if (!extracted.ok) {
      throw new AuthFlowError('id_token_invalid', `ID token rejected: ${extracted.error}`);
    }

    return {
      state: 'authenticated' as const,
      identity: extracted.identity,
      redirectTarget: exchange.redirectTarget,
      idToken
    };
  }

  private async redeemCode({
    metadata,
    exchange,
    authorizationCode
  }: {
    metadata: ProviderMetadata;
    exchange: OidcExchange;
    authorizationCode: string;
  }) {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code: authorizationCode,
      redirect_uri: this.options.redirectUri,
      client_id: this.options.clientId,
      code_verifier: exchange.codeVerifier
    });
    if (this.options.clientSecret) {
      body.set('client_secret', this.options.clientSecret);
    }

    // Authorization codes are single use, so the token request is never retried.
    const response = await this.send(metadata.token_endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json'
      },
      body: body.toString()
    });

    if (!response.ok) {
      throw new AuthFlowError('provider_rejected', `Token endpoint responded with status ${response.status}`);
    }

    const parsed = TokenResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new AuthFlowError('provider_rejected', 'Token endpoint response did not contain an ID token');
    }

    return parsed.data.id_token;
  }

  private async verify({metadata, idToken}: {metadata: ProviderMetadata; idToken: string}): Promise<JWTPayload> {
    const verifyWith = async (keyResolver: OidcJwtKeyResolver) =>
      verifyIdToken({
        token: idToken,
        keyResolver,
        expectedIssuer: metadata.issuer,
        clientId: this.options.clientId,
        now: this.now(),
        ...(this.options.clockToleranceSeconds !== undefined
          ? {clockToleranceSeconds: this.options.clockToleranceSeconds}
          : {})
      });

    let result = await verifyWith(await this.getKeyResolver(metadata));
    if (!result.ok && result.error === 'oidc_key_not_found') {
      // Provider key rotation: refresh the key set once.
      this.keyResolver = null;
      result = await verifyWith(await this.getKeyResolver(metadata));
    }

    if (!result.ok) {
      throw new AuthFlowError('id_token_invalid', `ID token rejected: ${result.error}`);
    }

    return result.payload;
  }

  private getKeyResolver(metadata: ProviderMetadata): Promise<OidcJwtKeyResolver> {
    if (!this.keyResolver) {
      const pending = this.getJsonWithRetry(metadata.jwks_uri).then(document => {
        const parsed = JsonWebKeySetSchema.safeParse(document);
        if (!parsed.success) {
          throw new AuthFlowError('provider_rejected', 'Identity provider key set is malformed');
        }

        return createLocalJWKSet(parsed.data);
      });
      this.keyResolver = pending;
      void pending.catch(() => {
        if (this.keyResolver === pending) {
          this.keyResolver = null;
        }
      });
    }

    return this.keyResolver;
  }

  private async loadMetadata(): Promise<ProviderMetadata> {
    const discoveryUrl = `${normalizeIssuer(this.options.issuer)}/.well-known/openid-configuration`;
    const parsed = ProviderMetadataSchema.safeParse(await this.getJsonWithRetry(discoveryUrl));
    if (!parsed.success) {
      throw new AuthFlowError('provider_rejected', 'Identity provider discovery document is malformed');
    }

    if (normalizeIssuer(parsed.data.issuer) !== normalizeIssuer(this.options.issuer)) {
      throw new AuthFlowError('provider_rejected', 'Identity provider issuer does not match configuration');
    }

    return {...parsed.data, ...this.options.endpointOverrides};
  }

  private async getJsonWithRetry(url: string): Promise<unknown> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        const response = await this.send(url, {method: 'GET', headers: {accept: 'application/json'}});
        if (!response.ok) {
          throw new AuthFlowError('provider_rejected', `Identity provider responded with status ${response.status}`);
        }

        return await this.readJson(response);
      } catch (error) {
        lastError = error;
      }
    }

    throw lastError;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        ...init,
        redirect: 'error',
        signal: AbortSignal.timeout(this.options.httpTimeoutMs)
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new AuthFlowError('upstream_timeout', `Identity provider did not respond within ${this.options.httpTimeoutMs}ms`);
      }

      throw new AuthFlowError('provider_rejected', 'Identity provider request failed');
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      throw new AuthFlowError('provider_rejected', 'Identity provider returned invalid JSON');
    }
  }

  private transition(transition: OidcFlowTransition) {
    this.options.onTransition?.(transition);
  }
}
