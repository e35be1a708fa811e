import type {Certificate} from '@ovpn-portal/schemas'
import {describe, expect, it, vi} from 'vitest'

import {
  authorize,
  authorizeCertificateAccess,
  normalizeFingerprint,
  renderAccessDenial,
  type PskPrincipal,
  type SessionPrincipal
} from '../accessControl'

const FINGERPRINT = 'ab'.repeat(32)

const user: SessionPrincipal = {kind: 'session', subject: 'alice', roles: ['user'], groups: []}
const otherUser: SessionPrincipal = {kind: 'session', subject: 'bob', roles: ['user'], groups: []}
const admin: SessionPrincipal = {kind: 'session', subject: 'root', roles: ['user', 'admin'], groups: ['vpn-admins']}
const serverPsk: PskPrincipal = {
  kind: 'psk',
  pskId: '6f1c1c55-9f59-4d43-9c59-2a6f1d0f1c01',
  pskType: 'server',
  templateSet: 'default',
  description: 'gw-1'
}
const computerPsk: PskPrincipal = {...serverPsk, pskType: 'computer'}

const certificate: Certificate = {
  fingerprint: FINGERPRINT,
  type: 'client',
  subject_dn: 'CN=alice',
  issuer_dn: 'CN=Test CA',
  serial_number: '01',
  owner_subject: 'alice',
  not_before: '2026-01-01T00:00:00.000Z',
  not_after: '2027-01-01T00:00:00.000Z',
  issued_at: '2026-01-01T00:00:00.000Z',
  revoked_at: null,
  revocation_reason: null
}

describe('authorize', () => {
  it('denies anonymous principals every action', () => {
    expect(authorize({kind: 'anonymous'}, 'profile.issue')).toEqual({effect: 'deny', reason: 'not_authenticated'})
    expect(authorize({kind: 'anonymous'}, 'bundle.server')).toEqual({effect: 'deny', reason: 'not_authenticated'})
  })

  it('keeps admin actions behind the admin role', () => {
    expect(authorize(user, 'psk.create')).toEqual({effect: 'deny', reason: 'insufficient_role'})
    expect(authorize(user, 'certificate.search')).toEqual({effect: 'deny', reason: 'insufficient_role'})
    expect(authorize(admin, 'psk.create')).toEqual({effect: 'allow'})
  })

  it('lets owners and admins reach a certificate and hides it from everyone else', () => {
    const resource = {kind: 'certificate', certificate} as const

    expect(authorize(user, 'certificate.read', resource)).toEqual({effect: 'allow'})
    expect(authorize(admin, 'certificate.revoke', resource)).toEqual({effect: 'allow'})
    expect(authorize(otherUser, 'certificate.read', resource)).toEqual({effect: 'deny', reason: 'not_owner'})
    expect(authorize(user, 'certificate.read', {kind: 'certificate', certificate: null})).toEqual({
      effect: 'deny',
      reason: 'no_such_resource'
    })
  })

  it('accepts a PSK only for the machine action of its own type', () => {
    expect(authorize(serverPsk, 'bundle.server')).toEqual({effect: 'allow'})
    expect(authorize(computerPsk, 'profile.computer')).toEqual({effect: 'allow'})
    expect(authorize(serverPsk, 'profile.computer')).toEqual({effect: 'deny', reason: 'wrong_psk_type'})
    expect(authorize(serverPsk, 'profile.issue')).toEqual({effect: 'deny', reason: 'not_authenticated'})
  })

  it('never lets a session stand in for a PSK', () => {
    expect(authorize(admin, 'bundle.server')).toEqual({effect: 'deny', reason: 'not_authenticated'})
  })
})

describe('normalizeFingerprint', () => {
  it('accepts colon-separated upper-case input', () => {
    const colonForm = FINGERPRINT.toUpperCase().match(/.{2}/gu)?.join(':')
    expect(normalizeFingerprint(colonForm)).toBe(FINGERPRINT)
  })

  it('rejects anything that is not 64 hex digits', () => {
    expect(normalizeFingerprint('abc')).toBeNull()
    expect(normalizeFingerprint(`${FINGERPRINT}00`)).toBeNull()
    expect(normalizeFingerprint('zz'.repeat(32))).toBeNull()
    expect(normalizeFingerprint(undefined)).toBeNull()
  })
})

describe('authorizeCertificateAccess', () => {
  it('rejects a malformed identifier without a lookup', async () => {
    const lookup = vi.fn(async () => certificate)

    const result = await authorizeCertificateAccess({
      principal: user,
      action: 'certificate.read',
      rawFingerprint: 'not-a-fingerprint',
      lookup
    })

    expect(result.decision).toEqual({effect: 'deny', reason: 'invalid_identifier'})
    expect(lookup).not.toHaveBeenCalled()
  })

  it('looks up by the normalized fingerprint', async () => {
    const lookup = vi.fn(async () => certificate)

    const result = await authorizeCertificateAccess({
      principal: user,
      action: 'certificate.revoke',
      rawFingerprint: FINGERPRINT.toUpperCase(),
      lookup
    })

    expect(lookup).toHaveBeenCalledWith(FINGERPRINT)
    expect(result).toEqual({decision: {effect: 'allow'}, certificate})
  })
})

describe('renderAccessDenial', () => {
  it('sends browsers to the login page with the original target', () => {
    expect(
      renderAccessDenial(
        {effect: 'deny', reason: 'not_authenticated'},
        {pathname: '/profile/certificates', search: '?page=2', json: false}
      )
    ).toEqual({kind: 'redirect', status: 302, location: '/auth/login?next=%2Fprofile%2Fcertificates%3Fpage%3D2'})
  })

  it('answers JSON clients with 401 and tells an expired session apart', () => {
    const missing = renderAccessDenial(
      {effect: 'deny', reason: 'not_authenticated'},
      {pathname: '/api/v1/server/bundle', search: '', json: true}
    )
    const expired = renderAccessDenial(
      {effect: 'deny', reason: 'not_authenticated'},
      {pathname: '/profile', search: '', json: true, sessionExpired: true}
    )

    expect(missing.kind === 'error' ? [missing.error.status, missing.error.code] : null).toEqual([401, 'auth_required'])
    expect(expired.kind === 'error' ? [expired.error.status, expired.error.code] : null).toEqual([
      401,
      'auth_session_expired'
    ])
  })

  it('renders ownership and identifier misses as the same 404', () => {
    const request = {pathname: '/profile/certificates/x', search: '', json: true}
    const bodies = (['not_owner', 'no_such_resource', 'invalid_identifier'] as const).map(reason => {
      const denial = renderAccessDenial({effect: 'deny', reason}, request)
      return denial.kind === 'error' ? [denial.error.status, denial.error.code, denial.error.message] : null
    })

    expect(bodies).toEqual([
      [404, 'certificate_not_found', 'Certificate not found'],
      [404, 'certificate_not_found', 'Certificate not found'],
      [404, 'certificate_not_found', 'Certificate not found']
    ])
  })

  it('maps role and PSK type denials to 403', () => {
    const request = {pathname: '/admin/psk', search: '', json: false}
    const role = renderAccessDenial({effect: 'deny', reason: 'insufficient_role'}, request)
    const pskType = renderAccessDenial({effect: 'deny', reason: 'wrong_psk_type'}, request)

    expect(role.kind === 'error' ? role.error.code : null).toBe('access_forbidden')
    expect(pskType.kind === 'error' ? [pskType.error.status, pskType.error.code] : null).toEqual([403, 'psk_wrong_type'])
  })
})
