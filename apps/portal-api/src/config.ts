import * as fs from 'node:fs';

import type {ProviderEndpointOverrides} from '@ovpn-portal/auth';
import {LogLevelSchema, type LogLevel} from '@ovpn-portal/logging';
import type {CertificateType} from '@ovpn-portal/schemas';
import {z} from 'zod';

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive());

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const DAY_SECONDS = 24 * 60 * 60;

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORTAL_HOST: z.string().default('0.0.0.0'),
    PORTAL_PORT: numberFromEnv.default(8080),
    PORTAL_MAX_BODY_BYTES: numberFromEnv.default(64 * 1024),
    PORTAL_SERVICE_NAME: z.string().min(1).default('ovpn-portal'),
    PORTAL_SERVICE_MODE: z.enum(['combined', 'user', 'admin']).default('combined'),
    PORTAL_USER_SERVICE_URL: optionalString,
    PORTAL_ADMIN_SERVICE_URL: optionalString,
    PORTAL_PUBLIC_BASE_URL: optionalString,
    PORTAL_OIDC_ISSUER: optionalString,
    PORTAL_OIDC_CLIENT_ID: optionalString,
    PORTAL_OIDC_CLIENT_SECRET: optionalString,
    PORTAL_OIDC_SCOPE: z.string().default('openid profile email'),
    PORTAL_OIDC_AUTHORIZATION_URL: optionalString,
    PORTAL_OIDC_TOKEN_URL: optionalString,
    PORTAL_OIDC_JWKS_URI: optionalString,
    PORTAL_OIDC_END_SESSION_URL: optionalString,
    PORTAL_OIDC_ADMIN_GROUP: z.string().min(1).default('vpn-admins'),
    PORTAL_OIDC_GROUPS_CLAIM: z.string().min(1).default('groups'),
    PORTAL_OIDC_HTTP_TIMEOUT_MS: numberFromEnv.default(10_000),
    PORTAL_OIDC_EXCHANGE_TTL_SECONDS: numberFromEnv.default(600),
    PORTAL_OIDC_POST_LOGOUT_REDIRECT: optionalString,
    PORTAL_SESSION_TTL_SECONDS: numberFromEnv.default(8 * 60 * 60),
    PORTAL_SESSION_COOKIE_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,64}$/u)
      .default('ovpn_portal_session'),
    PORTAL_SESSION_COOKIE_SECURE: booleanFromEnv.optional(),
    PORTAL_CERT_ISSUER_MODE: z.enum(['mock', 'local', 'vault']).optional(),
    PORTAL_CA_CHAIN_PEM: optionalString,
    PORTAL_LOCAL_CA_CERT_PATH: optionalString,
    PORTAL_LOCAL_CA_KEY_PATH: optionalString,
    PORTAL_VAULT_ADDR: optionalString,
    PORTAL_VAULT_TOKEN: optionalString,
    PORTAL_VAULT_PKI_MOUNT: z.string().default('pki'),
    PORTAL_VAULT_PKI_ROLE: optionalString,
    PORTAL_VAULT_REQUEST_TIMEOUT_MS: numberFromEnv.default(10_000),
    PORTAL_CLIENT_CERT_TTL_SECONDS: numberFromEnv.default(365 * DAY_SECONDS),
    PORTAL_SERVER_CERT_TTL_SECONDS: numberFromEnv.default(825 * DAY_SECONDS),
    PORTAL_COMPUTER_CERT_TTL_SECONDS: numberFromEnv.default(365 * DAY_SECONDS),
    PORTAL_TEMPLATE_SETS_JSON: optionalString,
    PORTAL_TEMPLATE_GROUPS_JSON: optionalString,
    PORTAL_TLS_CRYPT_KEY_PATH: optionalString,
    PORTAL_DUPLICATE_SUBMISSION_GUARD: booleanFromEnv.default(true),
    PORTAL_INFRA_ENABLED: booleanFromEnv.optional(),
    PORTAL_DATABASE_URL: optionalString,
    PORTAL_REDIS_URL: optionalString,
    PORTAL_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000),
    PORTAL_REDIS_KEY_PREFIX: z.string().default('ovpn-portal:auth:'),
    PORTAL_LOG_LEVEL: LogLevelSchema.optional(),
    PORTAL_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict();

export type ServiceMode = 'combined' | 'user' | 'admin';

export const TemplateSetSchema = z
  .object({
    name: z.string().regex(/^[a-z0-9][a-z0-9_-]{0,63}$/u),
    remote_host: z.string().min(1).max(253),
    port: z.number().int().min(1).max(65_535),
    protocol: z.enum(['udp', 'tcp']),
    cipher: z.string().regex(/^[A-Za-z0-9-]{1,64}$/u)
  })
  .strict();
export type TemplateSet = z.infer<typeof TemplateSetSchema>;

export type TemplateGroupMapping = {
  templateSet: string;
  groups: string[];
};

export type OidcConfig = {
  issuer: string;
  clientId: string;
  clientSecret?: string;
  scope: string;
  endpointOverrides: ProviderEndpointOverrides;
  adminGroup: string;
  groupsClaim: string;
  httpTimeoutMs: number;
  exchangeTtlSeconds: number;
  redirectUri: string;
  postLogoutRedirectUri: string;
};

export type MockCertificateIssuerConfig = {
  mode: 'mock';
};

export type LocalCertificateIssuerConfig = {
  mode: 'local';
  caChainPem: string;
  caCertPath: string;
  caKeyPath: string;
};

export type VaultCertificateIssuerConfig = {
  mode: 'vault';
  caChainPem: string;
  vaultAddr: string;
  vaultToken: string;
  vaultPkiMount: string;
  vaultPkiRole: string;
  vaultRequestTimeoutMs: number;
};

export type CertificateIssuerConfig =
  | MockCertificateIssuerConfig
  | LocalCertificateIssuerConfig
  | VaultCertificateIssuerConfig;

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  host: string;
  port: number;
  maxBodyBytes: number;
  service: {
    name: string;
    mode: ServiceMode;
    userServiceUrl?: string;
    adminServiceUrl?: string;
  };
  publicBaseUrl: string;
  oidc: OidcConfig;
  session: {
    ttlSeconds: number;
    cookieName: string;
    cookieSecure: boolean;
  };
  certificateIssuer: CertificateIssuerConfig;
  certificateTtlSeconds: Record<CertificateType, number>;
  profiles: {
    templateSets: TemplateSet[];
    templateGroups: TemplateGroupMapping[];
    tlsCryptKey?: string;
  };
  duplicateSubmissionGuard: boolean;
  infrastructure: {
    enabled: boolean;
    databaseUrl?: string;
    redisUrl?: string;
    redisConnectTimeoutMs: number;
    redisKeyPrefix: string;
  };
  logging: {
    level: LogLevel;
    redactExtraKeys: string[];
  };
};

export const DEFAULT_TEMPLATE_SETS: TemplateSet[] = [
  {name: 'default', remote_host: 'default.example.org', port: 1194, protocol: 'udp', cipher: 'AES-256-GCM'},
  {name: 'admin', remote_host: 'vpn.example.org', port: 1194, protocol: 'udp', cipher: 'AES-256-GCM'}
];

const TLS_CRYPT_KEY_PATTERN = /-----BEGIN OpenVPN Static key V1-----[\s\S]+-----END OpenVPN Static key V1-----/u;

const parseHttpUrl = ({raw, envVarName}: {raw: string; envVarName: string}) => {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`${envVarName} must be a valid URL`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`${envVarName} must use http or https`);
  }

  return raw.replace(/\/+$/u, '');
};

const parseCommaSeparatedKeys = (raw: string | undefined) => {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0);
};

const parseJsonEnv = ({raw, envVarName}: {raw: string; envVarName: string}): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new Error(`${envVarName} must be valid JSON`);
  }
};

const parseTemplateSets = (raw: string | undefined): TemplateSet[] => {
  if (!raw) {
    return DEFAULT_TEMPLATE_SETS;
  }

  const sets = z
    .array(TemplateSetSchema)
    .min(1)
    .parse(parseJsonEnv({raw, envVarName: 'PORTAL_TEMPLATE_SETS_JSON'}));
  const names = new Set(sets.map(set => set.name));
  if (names.size !== sets.length) {
    throw new Error('PORTAL_TEMPLATE_SETS_JSON contains duplicate template set names');
  }
  if (!names.has('default')) {
    throw new Error('PORTAL_TEMPLATE_SETS_JSON must define a "default" template set');
  }

  return sets;
};

const parseTemplateGroups = ({
  raw,
  adminGroup,
  templateSets
}: {
  raw: string | undefined;
  adminGroup: string;
  templateSets: TemplateSet[];
}): TemplateGroupMapping[] => {
  const knownSets = new Set(templateSets.map(set => set.name));
  if (!raw) {
    return knownSets.has('admin') ? [{templateSet: 'admin', groups: [adminGroup]}] : [];
  }

  const mapping = z
    .record(z.string().min(1), z.array(z.string().min(1)).min(1))
    .parse(parseJsonEnv({raw, envVarName: 'PORTAL_TEMPLATE_GROUPS_JSON'}));

  return Object.entries(mapping).map(([templateSet, groups]) => {
    if (!knownSets.has(templateSet)) {
      throw new Error(`PORTAL_TEMPLATE_GROUPS_JSON references unknown template set: ${templateSet}`);
    }

    return {templateSet, groups};
  });
};

const readTlsCryptKey = (path: string | undefined) => {
  if (!path) {
    return undefined;
  }

  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read tls-crypt key from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const match = TLS_CRYPT_KEY_PATTERN.exec(content);
  if (!match) {
    throw new Error('PORTAL_TLS_CRYPT_KEY_PATH does not contain an OpenVPN static key');
  }

  return match[0];
};

const parseCertificateIssuerConfig = ({
  mode,
  nodeEnv,
  caChainPem,
  localCaCertPath,
  localCaKeyPath,
  vaultAddr,
  vaultToken,
  vaultPkiMount,
  vaultPkiRole,
  vaultRequestTimeoutMs
}: {
  mode?: 'mock' | 'local' | 'vault';
  nodeEnv: ServiceConfig['nodeEnv'];
  caChainPem?: string;
  localCaCertPath?: string;
  localCaKeyPath?: string;
  vaultAddr?: string;
  vaultToken?: string;
  vaultPkiMount: string;
  vaultPkiRole?: string;
  vaultRequestTimeoutMs: number;
}): CertificateIssuerConfig => {
  const effectiveMode = mode ?? (nodeEnv === 'production' ? 'vault' : 'mock');

  if (effectiveMode === 'mock') {
    if (nodeEnv === 'production') {
      throw new Error('Mock certificate issuer mode is not allowed in production');
    }

    return {mode: 'mock'};
  }

  if (effectiveMode === 'local') {
    if (!localCaCertPath || !localCaKeyPath) {
      throw new Error('PORTAL_LOCAL_CA_CERT_PATH and PORTAL_LOCAL_CA_KEY_PATH are required in local certificate mode');
    }

    let resolvedChainPem = caChainPem;
    if (!resolvedChainPem) {
      try {
        resolvedChainPem = fs.readFileSync(localCaCertPath, 'utf-8');
      } catch (err) {
        throw new Error(
          `Failed to read CA certificate from ${localCaCertPath}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }

    return {
      mode: 'local',
      caChainPem: resolvedChainPem,
      caCertPath: localCaCertPath,
      caKeyPath: localCaKeyPath
    };
  }

  if (!vaultAddr || !vaultToken || !vaultPkiRole) {
    throw new Error('PORTAL_VAULT_ADDR, PORTAL_VAULT_TOKEN, and PORTAL_VAULT_PKI_ROLE are required in vault certificate mode');
  }

  if (!caChainPem) {
    throw new Error('PORTAL_CA_CHAIN_PEM is required in vault certificate mode');
  }

  const normalizedVaultAddr = parseHttpUrl({raw: vaultAddr, envVarName: 'PORTAL_VAULT_ADDR'});
  if (nodeEnv === 'production' && !normalizedVaultAddr.startsWith('https://')) {
    throw new Error('PORTAL_VAULT_ADDR must use https in production');
  }

  return {
    mode: 'vault',
    caChainPem,
    vaultAddr: normalizedVaultAddr,
    vaultToken,
    vaultPkiMount,
    vaultPkiRole,
    vaultRequestTimeoutMs
  };
};

const toEnvInput = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(
    Object.keys(envSchema.shape).map(key => [key, env[key]])
  );

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env));
  const nodeEnv = parsed.NODE_ENV;

  if (!parsed.PORTAL_OIDC_ISSUER || !parsed.PORTAL_OIDC_CLIENT_ID) {
    throw new Error('PORTAL_OIDC_ISSUER and PORTAL_OIDC_CLIENT_ID are required');
  }
  const issuer = parseHttpUrl({raw: parsed.PORTAL_OIDC_ISSUER, envVarName: 'PORTAL_OIDC_ISSUER'});
  if (nodeEnv === 'production' && !issuer.startsWith('https://')) {
    throw new Error('PORTAL_OIDC_ISSUER must use https in production');
  }

  if (nodeEnv === 'production' && !parsed.PORTAL_PUBLIC_BASE_URL) {
    throw new Error('PORTAL_PUBLIC_BASE_URL is required in production');
  }
  const publicBaseUrl = parseHttpUrl({
    raw: parsed.PORTAL_PUBLIC_BASE_URL ?? `http://localhost:${parsed.PORTAL_PORT}`,
    envVarName: 'PORTAL_PUBLIC_BASE_URL'
  });

  const infrastructureEnabled = parsed.PORTAL_INFRA_ENABLED ?? nodeEnv === 'production';
  if (nodeEnv === 'production' && !infrastructureEnabled) {
    throw new Error('PORTAL_INFRA_ENABLED cannot be disabled in production');
  }
  if (infrastructureEnabled && (!parsed.PORTAL_DATABASE_URL || !parsed.PORTAL_REDIS_URL)) {
    throw new Error('PORTAL_DATABASE_URL and PORTAL_REDIS_URL are required when infrastructure is enabled');
  }

  const endpointOverrides: ProviderEndpointOverrides = {
    ...(parsed.PORTAL_OIDC_AUTHORIZATION_URL
      ? {
          authorization_endpoint: parseHttpUrl({
            raw: parsed.PORTAL_OIDC_AUTHORIZATION_URL,
            envVarName: 'PORTAL_OIDC_AUTHORIZATION_URL'
          })
        }
      : {}),
    ...(parsed.PORTAL_OIDC_TOKEN_URL
      ? {token_endpoint: parseHttpUrl({raw: parsed.PORTAL_OIDC_TOKEN_URL, envVarName: 'PORTAL_OIDC_TOKEN_URL'})}
      : {}),
    ...(parsed.PORTAL_OIDC_JWKS_URI
      ? {jwks_uri: parseHttpUrl({raw: parsed.PORTAL_OIDC_JWKS_URI, envVarName: 'PORTAL_OIDC_JWKS_URI'})}
      : {}),
    ...(parsed.PORTAL_OIDC_END_SESSION_URL
      ? {
          end_session_endpoint: parseHttpUrl({
            raw: parsed.PORTAL_OIDC_END_SESSION_URL,
            envVarName: 'PORTAL_OIDC_END_SESSION_URL'
          })
        }
      : {})
  };

  const templateSets = parseTemplateSets(parsed.PORTAL_TEMPLATE_SETS_JSON);
  const tlsCryptKey = readTlsCryptKey(parsed.PORTAL_TLS_CRYPT_KEY_PATH);

  return {
    nodeEnv,
    host: parsed.PORTAL_HOST,
    port: parsed.PORTAL_PORT,
    maxBodyBytes: parsed.PORTAL_MAX_BODY_BYTES,
    service: {
      name: parsed.PORTAL_SERVICE_NAME,
      mode: parsed.PORTAL_SERVICE_MODE,
      ...(parsed.PORTAL_USER_SERVICE_URL
        ? {userServiceUrl: parseHttpUrl({raw: parsed.PORTAL_USER_SERVICE_URL, envVarName: 'PORTAL_USER_SERVICE_URL'})}
        : {}),
      ...(parsed.PORTAL_ADMIN_SERVICE_URL
        ? {
            adminServiceUrl: parseHttpUrl({raw: parsed.PORTAL_ADMIN_SERVICE_URL, envVarName: 'PORTAL_ADMIN_SERVICE_URL'})
          }
        : {})
    },
    publicBaseUrl,
    oidc: {
      issuer,
      clientId: parsed.PORTAL_OIDC_CLIENT_ID,
      ...(parsed.PORTAL_OIDC_CLIENT_SECRET ? {clientSecret: parsed.PORTAL_OIDC_CLIENT_SECRET} : {}),
      scope: parsed.PORTAL_OIDC_SCOPE,
      endpointOverrides,
      adminGroup: parsed.PORTAL_OIDC_ADMIN_GROUP,
      groupsClaim: parsed.PORTAL_OIDC_GROUPS_CLAIM,
      httpTimeoutMs: parsed.PORTAL_OIDC_HTTP_TIMEOUT_MS,
      exchangeTtlSeconds: parsed.PORTAL_OIDC_EXCHANGE_TTL_SECONDS,
      redirectUri: `${publicBaseUrl}/auth/callback`,
      postLogoutRedirectUri: parsed.PORTAL_OIDC_POST_LOGOUT_REDIRECT
        ? parseHttpUrl({raw: parsed.PORTAL_OIDC_POST_LOGOUT_REDIRECT, envVarName: 'PORTAL_OIDC_POST_LOGOUT_REDIRECT'})
        : `${publicBaseUrl}/auth/logout/complete`
    },
    session: {
      ttlSeconds: parsed.PORTAL_SESSION_TTL_SECONDS,
      cookieName: parsed.PORTAL_SESSION_COOKIE_NAME,
      cookieSecure: parsed.PORTAL_SESSION_COOKIE_SECURE ?? nodeEnv === 'production'
    },
    certificateIssuer: parseCertificateIssuerConfig({
      mode: parsed.PORTAL_CERT_ISSUER_MODE,
      nodeEnv,
      caChainPem: parsed.PORTAL_CA_CHAIN_PEM,
      localCaCertPath: parsed.PORTAL_LOCAL_CA_CERT_PATH,
      localCaKeyPath: parsed.PORTAL_LOCAL_CA_KEY_PATH,
      vaultAddr: parsed.PORTAL_VAULT_ADDR,
      vaultToken: parsed.PORTAL_VAULT_TOKEN,
      vaultPkiMount: parsed.PORTAL_VAULT_PKI_MOUNT,
      vaultPkiRole: parsed.PORTAL_VAULT_PKI_ROLE,
      vaultRequestTimeoutMs: parsed.PORTAL_VAULT_REQUEST_TIMEOUT_MS
    }),
    certificateTtlSeconds: {
      client: parsed.PORTAL_CLIENT_CERT_TTL_SECONDS,
      server: parsed.PORTAL_SERVER_CERT_TTL_SECONDS,
      computer: parsed.PORTAL_COMPUTER_CERT_TTL_SECONDS
    },
    profiles: {
      templateSets,
      templateGroups: parseTemplateGroups({
        raw: parsed.PORTAL_TEMPLATE_GROUPS_JSON,
        adminGroup: parsed.PORTAL_OIDC_ADMIN_GROUP,
        templateSets
      }),
      ...(tlsCryptKey ? {tlsCryptKey} : {})
    },
    duplicateSubmissionGuard: parsed.PORTAL_DUPLICATE_SUBMISSION_GUARD,
    infrastructure: {
      enabled: infrastructureEnabled,
      ...(parsed.PORTAL_DATABASE_URL ? {databaseUrl: parsed.PORTAL_DATABASE_URL} : {}),
      ...(parsed.PORTAL_REDIS_URL ? {redisUrl: parsed.PORTAL_REDIS_URL} : {}),
      redisConnectTimeoutMs: parsed.PORTAL_REDIS_CONNECT_TIMEOUT_MS,
      redisKeyPrefix: parsed.PORTAL_REDIS_KEY_PREFIX
    },
    logging: {
      level: parsed.PORTAL_LOG_LEVEL ?? (nodeEnv === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseCommaSeparatedKeys(parsed.PORTAL_LOG_REDACT_EXTRA_KEYS)
    }
  };
};
