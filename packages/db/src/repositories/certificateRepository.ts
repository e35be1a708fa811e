import {randomUUID} from 'node:crypto'

import {CertificateSchema, FingerprintSchema, type CertificateLogEntry} from '@ovpn-portal/schemas'
import {and, asc, count, desc, eq, gte, ilike, isNull, lt, type SQL} from 'drizzle-orm'
import type {NodePgDatabase} from 'drizzle-orm/node-postgres'

import type {
  CertificateRepository,
  CertificateSearchFilter,
  CertificateSearchResult,
  RecordIssuedCertificateInput,
  RevokeCertificateInput,
  RevokeCertificateResult
} from '../contracts.js'
import {DbRepositoryError, mapDatabaseError} from '../errors.js'
import {certificateLogEntries, certificates, type portalSchema} from '../schema.js'
import {assertPageBounds, escapeLikePattern} from '../utils.js'
import {toCertificate, toCertificateLogEntry, toCertificateRow} from './mappers.js'

export type PortalDatabase = NodePgDatabase<typeof portalSchema>

const assertFingerprint = (fingerprint: string) => {
  const parsed = FingerprintSchema.safeParse(fingerprint)
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', 'fingerprint must be 64 lowercase hex characters')
  }

  return parsed.data
}

export const buildCertificateSearchConditions = (filter: CertificateSearchFilter): SQL | undefined => {
  const conditions: SQL[] = []

  if (filter.type) {
    conditions.push(eq(certificates.certificateType, filter.type))
  }

  if (filter.subject) {
    conditions.push(ilike(certificates.subjectDn, `%${escapeLikePattern(filter.subject)}%`))
  }

  if (filter.ownerSubject) {
    conditions.push(eq(certificates.ownerSubject, filter.ownerSubject))
  }

  if (filter.issuedFrom) {
    conditions.push(gte(certificates.issuedAt, filter.issuedFrom))
  }

  if (filter.issuedBefore) {
    conditions.push(lt(certificates.issuedAt, filter.issuedBefore))
  }

  if (!filter.includeRevoked) {
    conditions.push(isNull(certificates.revokedAt))
  }

  return conditions.length > 0 ? and(...conditions) : undefined
}

export class PostgresCertificateRepository implements CertificateRepository {
  public constructor(private readonly db: PortalDatabase) {}

  public async recordIssued({certificate, actor}: RecordIssuedCertificateInput): Promise<CertificateLogEntry> {
    const parsed = CertificateSchema.safeParse(certificate)
    if (!parsed.success || parsed.data.revoked_at !== null) {
      throw new DbRepositoryError('validation_error', 'Issued certificate record is invalid')
    }

    try {
      return await this.db.transaction(async tx => {
        await tx.insert(certificates).values(toCertificateRow(parsed.data))
        const [entry] = await tx
          .insert(certificateLogEntries)
          .values({
            entryId: randomUUID(),
            event: 'issued',
            fingerprint: parsed.data.fingerprint,
            certificateType: parsed.data.type,
            subjectDn: parsed.data.subject_dn,
            actor,
            reason: null,
            recordedAt: new Date(parsed.data.issued_at)
          })
          .returning()

        if (!entry) {
          throw new DbRepositoryError('unexpected_error', 'Log entry was not written')
        }

        return toCertificateLogEntry(entry)
      })
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async findByFingerprint(fingerprint: string) {
    const normalized = assertFingerprint(fingerprint)

    try {
      const [row] = await this.db.select().from(certificates).where(eq(certificates.fingerprint, normalized)).limit(1)
      return row ? toCertificate(row) : null
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async search(filter: CertificateSearchFilter): Promise<CertificateSearchResult> {
    const {limit, offset} = assertPageBounds(filter)
    const where = buildCertificateSearchConditions(filter)

    try {
      const [totalRow] = await this.db.select({value: count()}).from(certificates).where(where)
      const rows = await this.db
        .select()
        .from(certificates)
        .where(where)
        .orderBy(desc(certificates.issuedAt), asc(certificates.fingerprint))
        .limit(limit)
        .offset(offset)

      return {items: rows.map(toCertificate), total: totalRow?.value ?? 0}
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async revoke({fingerprint, reason, actor, revokedAt}: RevokeCertificateInput): Promise<RevokeCertificateResult> {
    const normalized = assertFingerprint(fingerprint)

    try {
      return await this.db.transaction(async (tx): Promise<RevokeCertificateResult> => {
        const [updated] = await tx
          .update(certificates)
          .set({revokedAt, revocationReason: reason})
          .where(and(eq(certificates.fingerprint, normalized), isNull(certificates.revokedAt)))
          .returning()

        if (!updated) {
          const [existing] = await tx.select().from(certificates).where(eq(certificates.fingerprint, normalized)).limit(1)
          return existing ? {status: 'already_revoked', certificate: toCertificate(existing)} : {status: 'not_found'}
        }

        const [entry] = await tx
          .insert(certificateLogEntries)
          .values({
            entryId: randomUUID(),
            event: 'revoked',
            fingerprint: updated.fingerprint,
            certificateType: updated.certificateType,
            subjectDn: updated.subjectDn,
            actor,
            reason,
            recordedAt: revokedAt
          })
          .returning()

        if (!entry) {
          throw new DbRepositoryError('unexpected_error', 'Log entry was not written')
        }

        return {status: 'revoked', certificate: toCertificate(updated), entry: toCertificateLogEntry(entry)}
      })
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async listLogEntries({fingerprint, limit}: {fingerprint?: string; limit: number}) {
    const bounds = assertPageBounds({page: 1, limit})
    const where = fingerprint ? eq(certificateLogEntries.fingerprint, assertFingerprint(fingerprint)) : undefined

    try {
      const rows = await this.db
        .select()
        .from(certificateLogEntries)
        .where(where)
        .orderBy(asc(certificateLogEntries.sequence))
        .limit(bounds.limit)

      return rows.map(toCertificateLogEntry)
    } catch (error) {
      return mapDatabaseError(error)
    }
  }
}
