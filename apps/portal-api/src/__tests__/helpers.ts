import {createHash, randomBytes} from 'node:crypto'
import type {AddressInfo} from 'node:net'

import type {FetchLike} from '@ovpn-portal/auth'
import {createStructuredLogger} from '@ovpn-portal/logging'
import {SignJWT, exportJWK, generateKeyPair} from 'jose'
import {z} from 'zod'

import {DEFAULT_TEMPLATE_SETS, type ServiceConfig} from '../config'

export const ISSUER = 'https://idp.example.test/realms/vpn'
export const CLIENT_ID = 'ovpn-portal'

export const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  host: '127.0.0.1',
  port: 0,
  maxBodyBytes: 64 * 1024,
  service: {name: 'ovpn-portal', mode: 'combined'},
  publicBaseUrl: 'http://portal.example.test',
  oidc: {
    issuer: ISSUER,
    clientId: CLIENT_ID,
    scope: 'openid profile email',
    endpointOverrides: {},
    adminGroup: 'vpn-admins',
    groupsClaim: 'groups',
    httpTimeoutMs: 2_000,
    exchangeTtlSeconds: 600,
    redirectUri: 'http://portal.example.test/auth/callback',
    postLogoutRedirectUri: 'http://portal.example.test/auth/logout/complete'
  },
  session: {ttlSeconds: 3_600, cookieName: 'ovpn_portal_session', cookieSecure: false},
  certificateIssuer: {mode: 'mock'},
  certificateTtlSeconds: {client: 86_400, server: 86_400, computer: 86_400},
  profiles: {
    templateSets: DEFAULT_TEMPLATE_SETS,
    templateGroups: [{templateSet: 'admin', groups: ['vpn-admins']}]
  },
  duplicateSubmissionGuard: true,
  infrastructure: {enabled: false, redisConnectTimeoutMs: 2_000, redisKeyPrefix: 'test:auth:'},
  logging: {level: 'silent', redactExtraKeys: []},
  ...overrides
})

const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), {status, headers: {'content-type': 'application/json'}})

type PendingCode = {subject: string; nonce: string; codeChallenge: string; claims: Record<string, unknown>}

/** Discovery, JWKS and token endpoint served through an injected fetch. */
export const createIdentityProvider = async () => {
  const {privateKey, publicKey} = await generateKeyPair('ES256')
  const publicJwk = {...(await exportJWK(publicKey)), kid: 'test-key', alg: 'ES256', use: 'sig'}
  const codes = new Map<string, PendingCode>()

  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input)

    if (url.pathname.endsWith('/.well-known/openid-configuration')) {
      return json(200, {
        issuer: ISSUER,
        authorization_endpoint: `${ISSUER}/protocol/openid-connect/auth`,
        token_endpoint: `${ISSUER}/protocol/openid-connect/token`,
        jwks_uri: `${ISSUER}/protocol/openid-connect/certs`,
        end_session_endpoint: `${ISSUER}/protocol/openid-connect/logout`
      })
    }

    if (url.pathname.endsWith('/protocol/openid-connect/certs')) {
      return json(200, {keys: [publicJwk]})
    }

    if (url.pathname.endsWith('/protocol/openid-connect/token')) {
      const form = new URLSearchParams(typeof init?.body === 'string' ? init.body : '')
      const code = form.get('code') ?? ''
      const pending = codes.get(code)
      codes.delete(code)
      const verifier = form.get('code_verifier') ?? ''
      if (!pending || createHash('sha256').update(verifier).digest('base64url') !== pending.codeChallenge) {
        return json(400, {error: 'invalid_grant'})
      }

      const idToken = await new SignJWT({...pending.claims, nonce: pending.nonce})
        .setProtectedHeader({alg: 'ES256', kid: 'test-key'})
        .setSubject(pending.subject)
        .setIssuer(ISSUER)
        .setAudience(CLIENT_ID)
        .setIssuedAt()
        .setExpirationTime('5m')
        .sign(privateKey)
      return json(200, {access_token: 'test-access-token', token_type: 'Bearer', id_token: idToken})
    }

    return json(404, {error: 'not_found'})
  }

  return {
    fetch: fetchImpl,
    // Stands in for the user approving the login at the provider.
    authorize: (authorizationUrl: string, {subject, claims}: {subject: string; claims: Record<string, unknown>}) => {
      const params = new URL(authorizationUrl).searchParams
      const code = randomBytes(16).toString('hex')
      codes.set(code, {
        subject,
        claims,
        nonce: params.get('nonce') ?? '',
        codeChallenge: params.get('code_challenge') ?? ''
      })
      return {code, state: params.get('state') ?? ''}
    }
  }
}

export type IdentityProvider = Awaited<ReturnType<typeof createIdentityProvider>>

const JsonObjectSchema = z.record(z.string(), z.unknown())

export const readJson = async (response: Response) => JsonObjectSchema.parse(await response.json())

export const baseUrlOf = (address: string | AddressInfo | null) => {
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port')
  }

  return `http://127.0.0.1:${address.port}`
}

export const login = async ({
  baseUrl,
  provider,
  subject,
  groups = [],
  next = '/profile'
}: {
  baseUrl: string
  provider: IdentityProvider
  subject: string
  groups?: string[]
  next?: string
}) => {
  const start = await fetch(`${baseUrl}/auth/login?next=${encodeURIComponent(next)}`, {redirect: 'manual'})
  const {code, state} = provider.authorize(start.headers.get('location') ?? '', {
    subject,
    claims: {name: `Test ${subject}`, groups}
  })

  const callback = await fetch(`${baseUrl}/auth/callback?code=${code}&state=${encodeURIComponent(state)}`, {
    redirect: 'manual'
  })
  const cookie = (callback.headers.get('set-cookie') ?? '').split(';', 1)[0] ?? ''
  const session = await readJson(
    await fetch(`${baseUrl}/auth/session`, {headers: {cookie, accept: 'application/json'}})
  )

  return {cookie, csrfToken: String(session.csrf_token), callback}
}

/** Logger that keeps every emitted line as a parsed object. */
export const createLogCapture = () => {
  const events: Record<string, unknown>[] = []
  const stream = {
    write: (chunk: string | Uint8Array) => {
      events.push(JsonObjectSchema.parse(JSON.parse(String(chunk))))
      return true
    }
  }
  const logger = createStructuredLogger({
    service: 'ovpn-portal',
    env: 'test',
    level: 'debug',
    writer: {stdout: stream, stderr: stream}
  })

  return {logger, events, writer: {stdout: stream, stderr: stream}}
}
