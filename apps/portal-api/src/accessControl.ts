import type {Certificate, PskType, Role} from '@ovpn-portal/schemas'

import {AppError, certificateNotFound, forbidden, fromPskError, unauthorized} from './errors'

export type SessionPrincipal = {
  kind: 'session'
  subject: string
  roles: Role[]
  groups: string[]
}

export type PskPrincipal = {
  kind: 'psk'
  pskId: string
  pskType: PskType
  templateSet: string
  description: string
}

export type Principal = SessionPrincipal | PskPrincipal | {kind: 'anonymous'}

export type AccessAction =
  | 'profile.issue'
  | 'certificate.list_own'
  | 'certificate.read'
  | 'certificate.revoke'
  | 'certificate.search'
  | 'certificate.issue_server'
  | 'psk.list'
  | 'psk.create'
  | 'psk.revoke'
  | 'bundle.server'
  | 'profile.computer'

export type AccessResource = {kind: 'certificate'; certificate: Certificate | null}

export type DenyReason =
  | 'not_authenticated'
  | 'insufficient_role'
  | 'not_owner'
  | 'no_such_resource'
  | 'invalid_identifier'
  | 'wrong_psk_type'

export type AccessDecision = {effect: 'allow'} | {effect: 'deny'; reason: DenyReason}
export type DenyDecision = Extract<AccessDecision, {effect: 'deny'}>

export class AccessDeniedError extends Error {
  public readonly decision: DenyDecision
  public readonly sessionExpired: boolean

  public constructor(decision: DenyDecision, options: {sessionExpired?: boolean} = {}) {
    super(`Access denied: ${decision.reason}`)
    this.name = 'AccessDeniedError'
    this.decision = decision
    this.sessionExpired = options.sessionExpired ?? false
  }
}

export const isAccessDeniedError = (value: unknown): value is AccessDeniedError => value instanceof AccessDeniedError

export const assertAllowed = (decision: AccessDecision) => {
  if (decision.effect === 'deny') {
    throw new AccessDeniedError(decision)
  }
}

const ALLOW: AccessDecision = {effect: 'allow'}
const deny = (reason: DenyReason): AccessDecision => ({effect: 'deny', reason})

const ADMIN_ACTIONS: ReadonlySet<AccessAction> = new Set([
  'certificate.search',
  'certificate.issue_server',
  'psk.list',
  'psk.create',
  'psk.revoke'
])

const PSK_ACTIONS: Readonly<Partial<Record<AccessAction, PskType>>> = {
  'bundle.server': 'server',
  'profile.computer': 'computer'
}

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/u

/** Accepts `AB:CD:…` and mixed case; returns the canonical lowercase hex form or null. */
export const normalizeFingerprint = (raw: string | undefined): string | null => {
  if (!raw || raw.length > 128) {
    return null
  }

  const candidate = raw.trim().replace(/:/gu, '').toLowerCase()
  return FINGERPRINT_PATTERN.test(candidate) ? candidate : null
}

const authorizeCertificate = (principal: SessionPrincipal, resource: AccessResource | undefined): AccessDecision => {
  const certificate = resource?.certificate
  if (!certificate) {
    return deny('no_such_resource')
  }

  if (principal.roles.includes('admin') || certificate.owner_subject === principal.subject) {
    return ALLOW
  }

  return deny('not_owner')
}

export const authorize = (principal: Principal, action: AccessAction, resource?: AccessResource): AccessDecision => {
  const requiredPskType = PSK_ACTIONS[action]

  if (principal.kind === 'psk') {
    if (!requiredPskType) {
      return deny('not_authenticated')
    }

    return principal.pskType === requiredPskType ? ALLOW : deny('wrong_psk_type')
  }

  if (principal.kind === 'anonymous' || requiredPskType) {
    return deny('not_authenticated')
  }

  if (ADMIN_ACTIONS.has(action)) {
    return principal.roles.includes('admin') ? ALLOW : deny('insufficient_role')
  }

  if (action === 'certificate.read' || action === 'certificate.revoke') {
    return authorizeCertificate(principal, resource)
  }

  return ALLOW
}

/**
 * Identifier validation, lookup and authorization for one certificate, in that order.
 * A malformed fingerprint never reaches the lookup.
 */
export const authorizeCertificateAccess = async ({
  principal,
  action,
  rawFingerprint,
  lookup
}: {
  principal: Principal
  action: 'certificate.read' | 'certificate.revoke'
  rawFingerprint: string | undefined
  lookup: (fingerprint: string) => Promise<Certificate | null>
}): Promise<{decision: AccessDecision; certificate: Certificate | null}> => {
  if (principal.kind !== 'session') {
    return {decision: authorize(principal, action), certificate: null}
  }

  const fingerprint = normalizeFingerprint(rawFingerprint)
  if (!fingerprint) {
    return {decision: deny('invalid_identifier'), certificate: null}
  }

  const certificate = await lookup(fingerprint)
  return {decision: authorize(principal, action, {kind: 'certificate', certificate}), certificate}
}

export type DenialRequest = {
  pathname: string
  search: string
  json: boolean
  sessionExpired?: boolean
}

export type AccessDenialResponse =
  | {kind: 'redirect'; status: 302; location: string}
  | {kind: 'error'; error: AppError}

export const loginLocation = (target: string) => `/auth/login?next=${encodeURIComponent(target)}`

export const renderAccessDenial = (
  decision: DenyDecision,
  request: DenialRequest
): AccessDenialResponse => {
  switch (decision.reason) {
    case 'not_authenticated':
      if (request.json) {
        return {
          kind: 'error',
          error: request.sessionExpired
            ? unauthorized('auth_session_expired', 'Session has expired')
            : unauthorized('auth_required', 'Authentication is required')
        }
      }

      return {kind: 'redirect', status: 302, location: loginLocation(`${request.pathname}${request.search}`)}
    case 'insufficient_role':
      return {kind: 'error', error: forbidden('access_forbidden', 'Access to this resource is forbidden')}
    case 'not_owner':
    case 'no_such_resource':
    case 'invalid_identifier':
      return {kind: 'error', error: certificateNotFound()}
    case 'wrong_psk_type':
      return {kind: 'error', error: fromPskError('wrong_type')}
  }
}
