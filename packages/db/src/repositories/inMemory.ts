import {randomUUID} from 'node:crypto'

import {
  CertificateSchema,
  FingerprintSchema,
  PskRecordSchema,
  type Certificate,
  type CertificateLogEntry,
  type PskCredential,
  type PskRecord
} from '@ovpn-portal/schemas'

import type {
  CertificateRepository,
  CertificateSearchFilter,
  CertificateSearchResult,
  CreatePskInput,
  PskRepository,
  RecordIssuedCertificateInput,
  RevokeCertificateInput,
  RevokeCertificateResult
} from '../contracts.js'
import {DbRepositoryError} from '../errors.js'
import {assertPageBounds} from '../utils.js'

export const matchesCertificateFilter = (certificate: Certificate, filter: CertificateSearchFilter): boolean => {
  if (filter.type && certificate.type !== filter.type) {
    return false
  }

  if (filter.subject && !certificate.subject_dn.toLowerCase().includes(filter.subject.toLowerCase())) {
    return false
  }

  if (filter.ownerSubject && certificate.owner_subject !== filter.ownerSubject) {
    return false
  }

  const issuedAt = Date.parse(certificate.issued_at)
  if (filter.issuedFrom && issuedAt < filter.issuedFrom.getTime()) {
    return false
  }

  if (filter.issuedBefore && issuedAt >= filter.issuedBefore.getTime()) {
    return false
  }

  return filter.includeRevoked || certificate.revoked_at === null
}

const compareNewestFirst = (left: Certificate, right: Certificate) =>
  Date.parse(right.issued_at) - Date.parse(left.issued_at) || left.fingerprint.localeCompare(right.fingerprint)

export class InMemoryCertificateRepository implements CertificateRepository {
  private readonly certificates = new Map<string, Certificate>()
  private readonly entries: CertificateLogEntry[] = []

  public async recordIssued({certificate, actor}: RecordIssuedCertificateInput): Promise<CertificateLogEntry> {
    const parsed = CertificateSchema.safeParse(certificate)
    if (!parsed.success || parsed.data.revoked_at !== null) {
      throw new DbRepositoryError('validation_error', 'Issued certificate record is invalid')
    }

    if (this.certificates.has(parsed.data.fingerprint)) {
      throw new DbRepositoryError('unique_violation', 'Unique constraint violated')
    }

    this.certificates.set(parsed.data.fingerprint, parsed.data)
    return this.appendEntry({
      event: 'issued',
      certificate: parsed.data,
      actor,
      reason: null,
      recordedAt: parsed.data.issued_at
    })
  }

  public async findByFingerprint(fingerprint: string): Promise<Certificate | null> {
    if (!FingerprintSchema.safeParse(fingerprint).success) {
      throw new DbRepositoryError('validation_error', 'fingerprint must be 64 lowercase hex characters')
    }

    return this.certificates.get(fingerprint) ?? null
  }

  public async search(filter: CertificateSearchFilter): Promise<CertificateSearchResult> {
    const {limit, offset} = assertPageBounds(filter)
    const matching = [...this.certificates.values()]
      .filter(certificate => matchesCertificateFilter(certificate, filter))
      .sort(compareNewestFirst)

    return {items: matching.slice(offset, offset + limit), total: matching.length}
  }

  public async revoke({fingerprint, reason, actor, revokedAt}: RevokeCertificateInput): Promise<RevokeCertificateResult> {
    const existing = this.certificates.get(fingerprint)
    if (!existing) {
      return {status: 'not_found'}
    }

    if (existing.revoked_at !== null) {
      return {status: 'already_revoked', certificate: existing}
    }

    const revoked: Certificate = {...existing, revoked_at: revokedAt.toISOString(), revocation_reason: reason}
    this.certificates.set(fingerprint, revoked)
    const entry = this.appendEntry({
      event: 'revoked',
      certificate: revoked,
      actor,
      reason,
      recordedAt: revokedAt.toISOString()
    })

    return {status: 'revoked', certificate: revoked, entry}
  }

  public async listLogEntries({fingerprint, limit}: {fingerprint?: string; limit: number}): Promise<CertificateLogEntry[]> {
    const bounds = assertPageBounds({page: 1, limit})
    const matching = fingerprint ? this.entries.filter(entry => entry.fingerprint === fingerprint) : this.entries
    return matching.slice(0, bounds.limit)
  }

  private appendEntry({
    event,
    certificate,
    actor,
    reason,
    recordedAt
  }: {
    event: CertificateLogEntry['event']
    certificate: Certificate
    actor: string
    reason: CertificateLogEntry['reason']
    recordedAt: string
  }): CertificateLogEntry {
    const entry: CertificateLogEntry = {
      entry_id: randomUUID(),
      sequence: this.entries.length + 1,
      event,
      fingerprint: certificate.fingerprint,
      certificate_type: certificate.type,
      subject_dn: certificate.subject_dn,
      actor,
      reason,
      recorded_at: recordedAt
    }
    this.entries.push(entry)
    return entry
  }
}

type StoredPsk = {
  record: PskRecord
  secretHash: string
}

const toCredential = ({record, secretHash}: StoredPsk): PskCredential => ({
  pskId: record.psk_id,
  secretHash,
  description: record.description,
  pskType: record.psk_type,
  templateSet: record.template_set,
  expiresAt: record.expires_at,
  revokedAt: record.revoked_at
})

export class InMemoryPskRepository implements PskRepository {
  private readonly keys = new Map<string, StoredPsk>()

  public async create({record, secretHash}: CreatePskInput): Promise<PskRecord> {
    const parsed = PskRecordSchema.safeParse(record)
    if (!parsed.success) {
      throw new DbRepositoryError('validation_error', 'Pre-shared key record is invalid')
    }

    const duplicate = [...this.keys.values()].some(
      item => item.record.psk_id === parsed.data.psk_id || item.secretHash === secretHash
    )
    if (duplicate) {
      throw new DbRepositoryError('unique_violation', 'Unique constraint violated')
    }

    this.keys.set(parsed.data.psk_id, {record: parsed.data, secretHash})
    return parsed.data
  }

  public async findById(pskId: string): Promise<PskRecord | null> {
    return this.keys.get(pskId)?.record ?? null
  }

  public async findCredentialByHash(secretHash: string): Promise<PskCredential | null> {
    const stored = [...this.keys.values()].find(item => item.secretHash === secretHash)
    return stored ? toCredential(stored) : null
  }

  public async list(): Promise<PskRecord[]> {
    const records = [...this.keys.values()]
      .map(item => item.record)
      .sort((left, right) => Date.parse(right.created_at) - Date.parse(left.created_at))
    return records
  }

  public async revoke({pskId, revokedAt}: {pskId: string; revokedAt: Date}): Promise<PskRecord | null> {
    const stored = this.keys.get(pskId)
    if (!stored) {
      return null
    }

    if (stored.record.revoked_at === null) {
      stored.record = {...stored.record, revoked_at: revokedAt.toISOString()}
    }

    return stored.record
  }

  public async touchLastUsed({pskId, usedAt}: {pskId: string; usedAt: Date}): Promise<void> {
    const stored = this.keys.get(pskId)
    if (stored) {
      stored.record = {...stored.record, last_used_at: usedAt.toISOString()}
    }
  }
}
