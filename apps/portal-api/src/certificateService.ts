import {createHash, webcrypto} from 'node:crypto'

import type {CertificateRepository} from '@ovpn-portal/db'
import type {StructuredLogger} from '@ovpn-portal/logging'
import {
  CertificateSchema,
  type Certificate,
  type CertificateType,
  type RevocationReason
} from '@ovpn-portal/schemas'
import * as x509 from '@peculiar/x509'

import {
  assertAllowed,
  authorize,
  authorizeCertificateAccess,
  AccessDeniedError,
  type AccessAction,
  type Principal
} from './accessControl'
import type {CertificateAuthority} from './certificateIssuer'
import {badGateway, badRequest} from './errors'
import type {SubmissionGuard} from './submissionGuard'

export type IssueCertificateInput = {
  type: CertificateType
  commonName: string
  principal: Principal
  actor: string
  ttlSeconds?: number
}

export type IssuedCertificate = {
  certificate: Certificate
  certificatePem: string
  privateKeyPem: string
  caChainPem: string
}

export type RevokeCertificateOutcome = {
  certificate: Certificate
  alreadyRevoked: boolean
}

const COMMON_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 ._@:|-]{0,63}$/u
const CSR_SIGNING_ALGORITHM = {name: 'ECDSA', hash: 'SHA-256'} as const

/** Reduces an arbitrary identity string to something usable as a CN. */
export const toCommonName = (value: string) => {
  const cleaned = value
    .trim()
    .replace(/[^A-Za-z0-9 ._@:|-]/gu, '_')
    .replace(/^[^A-Za-z0-9]+/u, '')
    .slice(0, 64)
  return cleaned.length > 0 ? cleaned : 'unnamed'
}

export const computeFingerprint = (der: ArrayBuffer | Uint8Array) =>
  createHash('sha256').update(new Uint8Array(der)).digest('hex')

const resolveIssueAction = ({type, principal}: {type: CertificateType; principal: Principal}): AccessAction => {
  switch (type) {
    case 'client':
      return 'profile.issue'
    case 'server':
      return principal.kind === 'session' ? 'certificate.issue_server' : 'bundle.server'
    case 'computer':
      return 'profile.computer'
  }
}

// Client certificates belong to the logged-in subject; machine certificates have no owner.
const resolveOwner = ({type, principal}: {type: CertificateType; principal: Principal}) =>
  type === 'client' && principal.kind === 'session' ? principal.subject : null

export class CertificateService {
  private readonly now: () => Date

  public constructor(
    private readonly dependencies: {
      repository: CertificateRepository
      authority: CertificateAuthority
      guard: SubmissionGuard
      logger: StructuredLogger
      ttlSeconds: Record<CertificateType, number>
      now?: () => Date
    }
  ) {
    this.now = dependencies.now ?? (() => new Date())
  }

  public async issue(input: IssueCertificateInput): Promise<IssuedCertificate> {
    assertAllowed(authorize(input.principal, resolveIssueAction(input)))

    if (!COMMON_NAME_PATTERN.test(input.commonName)) {
      throw badRequest('request_invalid', 'Common name is empty or contains unsupported characters')
    }

    const maxTtl = this.dependencies.ttlSeconds[input.type]
    const ttlSeconds = input.ttlSeconds ?? maxTtl
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0 || ttlSeconds > maxTtl) {
      throw badRequest('request_invalid', `Certificate lifetime must be between 1 and ${maxTtl} seconds`)
    }

    return this.dependencies.guard.run(
      {actor: input.actor, operation: `certificate.issue.${input.type}`, subject: input.commonName},
      () => this.signAndRecord({...input, ttlSeconds})
    )
  }

  private async signAndRecord(input: IssueCertificateInput & {ttlSeconds: number}): Promise<IssuedCertificate> {
    const keys = await webcrypto.subtle.generateKey({name: 'ECDSA', namedCurve: 'P-256'}, true, ['sign', 'verify'])
    const csr = await x509.Pkcs10CertificateRequestGenerator.create({
      name: `CN=${input.commonName}`,
      keys,
      signingAlgorithm: CSR_SIGNING_ALGORITHM
    })
    const privateKeyDer = await webcrypto.subtle.exportKey('pkcs8', keys.privateKey)

    const signed = await this.dependencies.authority.sign({
      csrPem: csr.toString('pem'),
      type: input.type,
      commonName: input.commonName,
      ttlSeconds: input.ttlSeconds
    })

    let parsed: x509.X509Certificate
    try {
      parsed = new x509.X509Certificate(signed.certificatePem)
    } catch {
      throw badGateway('upstream_rejected', 'Certificate authority returned an unreadable certificate')
    }

    const certificate = CertificateSchema.parse({
      fingerprint: computeFingerprint(parsed.rawData),
      type: input.type,
      subject_dn: parsed.subject,
      issuer_dn: parsed.issuer,
      serial_number: parsed.serialNumber.toLowerCase(),
      owner_subject: resolveOwner(input),
      not_before: parsed.notBefore.toISOString(),
      not_after: parsed.notAfter.toISOString(),
      issued_at: this.now().toISOString(),
      revoked_at: null,
      revocation_reason: null
    })

    const entry = await this.dependencies.repository.recordIssued({certificate, actor: input.actor})
    this.dependencies.logger.info({
      event: 'certificate.issued',
      component: 'certificate.service',
      message: 'Certificate issued',
      metadata: {
        fingerprint: certificate.fingerprint,
        certificate_type: certificate.type,
        actor: input.actor,
        log_sequence: entry.sequence,
        ca_mode: this.dependencies.authority.mode
      }
    })

    return {
      certificate,
      certificatePem: x509.PemConverter.encode(parsed.rawData, 'CERTIFICATE'),
      privateKeyPem: x509.PemConverter.encode(privateKeyDer, 'PRIVATE KEY'),
      caChainPem: signed.caChainPem
    }
  }

  public async read({principal, fingerprint}: {principal: Principal; fingerprint: string | undefined}) {
    const {decision, certificate} = await authorizeCertificateAccess({
      principal,
      action: 'certificate.read',
      rawFingerprint: fingerprint,
      lookup: value => this.dependencies.repository.findByFingerprint(value)
    })
    assertAllowed(decision)
    if (!certificate) {
      throw new AccessDeniedError({effect: 'deny', reason: 'no_such_resource'})
    }

    return certificate
  }

  public async revoke({
    principal,
    fingerprint,
    reason,
    actor
  }: {
    principal: Principal
    fingerprint: string | undefined
    reason: RevocationReason
    actor: string
  }): Promise<RevokeCertificateOutcome> {
    const {decision, certificate} = await authorizeCertificateAccess({
      principal,
      action: 'certificate.revoke',
      rawFingerprint: fingerprint,
      lookup: value => this.dependencies.repository.findByFingerprint(value)
    })
    assertAllowed(decision)
    if (!certificate) {
      throw new AccessDeniedError({effect: 'deny', reason: 'no_such_resource'})
    }

    const result = await this.dependencies.repository.revoke({
      fingerprint: certificate.fingerprint,
      reason,
      actor,
      revokedAt: this.now()
    })

    if (result.status === 'not_found') {
      throw new AccessDeniedError({effect: 'deny', reason: 'no_such_resource'})
    }

    if (result.status === 'already_revoked') {
      return {certificate: result.certificate, alreadyRevoked: true}
    }

    this.dependencies.logger.info({
      event: 'certificate.revoked',
      component: 'certificate.service',
      message: 'Certificate revoked',
      metadata: {
        fingerprint: result.certificate.fingerprint,
        certificate_type: result.certificate.type,
        reason,
        actor,
        log_sequence: result.entry.sequence
      }
    })

    return {certificate: result.certificate, alreadyRevoked: false}
  }
}
