import {errors as joseErrors, jwtVerify, type JWTPayload, type JWTVerifyGetKey} from 'jose';
import {z} from 'zod';

import type {Role} from '@ovpn-portal/schemas';

import type {AuthenticatedIdentity} from './types';

// Asymmetric only: `none` and the HMAC family are refused before any key lookup.
const ID_TOKEN_ALGORITHMS = ['RS256', 'RS384', 'RS512', 'PS256', 'PS384', 'PS512', 'ES256', 'ES384', 'ES512', 'EdDSA'];

const MAX_ID_TOKEN_LENGTH = 16_384;
const MAX_GROUPS = 256;

export const ProviderMetadataSchema = z
  .object({
    issuer: z.string().url(),
    authorization_endpoint: z.string().url(),
    token_endpoint: z.string().url(),
    jwks_uri: z.string().url(),
    end_session_endpoint: z.string().url().optional(),
    code_challenge_methods_supported: z.array(z.string()).optional()
  })
  .loose();

export type ProviderMetadata = z.infer<typeof ProviderMetadataSchema>;

const JsonWebKeySchema = z
  .object({
    kty: z.string().min(1),
    kid: z.string().optional(),
    use: z.string().optional(),
    alg: z.string().optional(),
    n: z.string().optional(),
    e: z.string().optional(),
    crv: z.string().optional(),
    x: z.string().optional(),
    y: z.string().optional()
  })
  .loose();

export const JsonWebKeySetSchema = z.object({keys: z.array(JsonWebKeySchema)}).loose();

export type OidcJwtKeyResolver = JWTVerifyGetKey;

const ClaimTextSchema = z.string().trim().min(1);

const readText = (value: unknown) => {
  const parsed = ClaimTextSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

// A claim that may be a single string or a list of them, deduplicated.
const readTextList = (value: unknown) => {
  const candidates: unknown[] = Array.isArray(value) ? value : [value];
  const texts = candidates.map(readText).filter((text): text is string => text !== null);
  return [...new Set(texts)];
};

export const normalizeIssuer = (value: string) => value.trim().replace(/\/+$/u, '');

const JOSE_ERROR_CODES: Record<string, string> = {
  [joseErrors.JWTExpired.code]: 'oidc_token_expired',
  [joseErrors.JWKSNoMatchingKey.code]: 'oidc_key_not_found',
  [joseErrors.JWKSMultipleMatchingKeys.code]: 'oidc_signature_invalid',
  [joseErrors.JWSSignatureVerificationFailed.code]: 'oidc_signature_invalid',
  [joseErrors.JOSEAlgNotAllowed.code]: 'oidc_alg_not_allowed',
  [joseErrors.JWTClaimValidationFailed.code]: 'oidc_token_claims_invalid'
};

const toVerificationError = (error: unknown) =>
  error instanceof joseErrors.JOSEError ? (JOSE_ERROR_CODES[error.code] ?? 'oidc_token_invalid') : 'oidc_token_invalid';

export type ValidateIssuerAudienceInput = {
  issuer: unknown;
  audience: unknown;
  authorizedParty?: unknown;
  expectedIssuer: string;
  expectedAudience: string;
};

export type ValidateIssuerAudienceResult =
  | {ok: true; issuer: string; audience: string[]}
  | {ok: false; error: string};

export const validateIssuerAudience = ({
  issuer,
  audience,
  authorizedParty,
  expectedIssuer,
  expectedAudience
}: ValidateIssuerAudienceInput): ValidateIssuerAudienceResult => {
  const tokenIssuer = readText(issuer);
  if (!tokenIssuer) {
    return {ok: false, error: 'oidc_issuer_missing'};
  }
  if (normalizeIssuer(tokenIssuer) !== normalizeIssuer(expectedIssuer)) {
    return {ok: false, error: 'oidc_issuer_mismatch'};
  }

  const audiences = readTextList(audience);
  if (audiences.length === 0) {
    return {ok: false, error: 'oidc_audience_missing'};
  }
  if (!audiences.includes(expectedAudience)) {
    return {ok: false, error: 'oidc_audience_mismatch'};
  }

  // With several audiences, azp must be present and name this client.
  const azp = readText(authorizedParty);
  if (azp === null && audiences.length > 1) {
    return {ok: false, error: 'oidc_azp_missing'};
  }
  if (azp !== null && azp !== expectedAudience) {
    return {ok: false, error: 'oidc_azp_mismatch'};
  }

  return {ok: true, issuer: tokenIssuer, audience: audiences};
};

export type VerifyIdTokenInput = {
  token: string;
  keyResolver: OidcJwtKeyResolver;
  expectedIssuer: string;
  clientId: string;
  now?: Date;
  clockToleranceSeconds?: number;
};

export type VerifyIdTokenResult = {ok: true; payload: JWTPayload} | {ok: false; error: string};

const ClockToleranceSchema = z.number().int().min(0).max(300);

export const verifyIdToken = async ({
  token,
  keyResolver,
  expectedIssuer,
  clientId,
  now = new Date(),
  clockToleranceSeconds = 60
}: VerifyIdTokenInput): Promise<VerifyIdTokenResult> => {
  const compact = token.trim();
  if (compact.length === 0 || compact.length > MAX_ID_TOKEN_LENGTH) {
    return {ok: false, error: 'oidc_token_invalid'};
  }
  if (!ClockToleranceSchema.safeParse(clockToleranceSeconds).success) {
    return {ok: false, error: 'oidc_verifier_config_invalid'};
  }

  let payload: JWTPayload;
  try {
    ({payload} = await jwtVerify(compact, keyResolver, {
      algorithms: ID_TOKEN_ALGORITHMS,
      requiredClaims: ['exp', 'sub'],
      currentDate: now,
      clockTolerance: clockToleranceSeconds
    }));
  } catch (error) {
    return {ok: false, error: toVerificationError(error)};
  }

  const claims = validateIssuerAudience({
    issuer: payload.iss,
    audience: payload.aud,
    authorizedParty: payload.azp,
    expectedIssuer,
    expectedAudience: clientId
  });

  return claims.ok ? {ok: true, payload} : claims;
};

export type ExtractIdentityResult = {ok: true; identity: AuthenticatedIdentity} | {ok: false; error: string};

export const extractIdentityClaims = ({
  payload,
  groupsClaim,
  adminGroup
}: {
  payload: JWTPayload;
  groupsClaim: string;
  adminGroup: string;
}): ExtractIdentityResult => {
  const subject = readText(payload.sub);
  if (subject === null || subject.length > 256) {
    return {ok: false, error: 'oidc_subject_missing'};
  }

  const email = readText(payload.email);
  const displayName = readText(payload.name) ?? readText(payload.preferred_username) ?? email ?? subject;
  const groups = readTextList(payload[groupsClaim]).slice(0, MAX_GROUPS);
  const roles: Role[] = groups.includes(adminGroup) ? ['user', 'admin'] : ['user'];

  return {
    ok: true,
    identity: {
      subject,
      displayName: displayName.slice(0, 256),
      ...(email !== null && email.length <= 320 ? {email} : {}),
      groups,
      roles
    }
  };
};
