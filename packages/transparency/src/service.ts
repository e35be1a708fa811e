import type {CertificateRepository} from '@ovpn-portal/db'
import {
  FingerprintSchema,
  type Certificate,
  type CertificateLogEntry,
  type PublicCertificate
} from '@ovpn-portal/schemas'

import type {CertificateQuery, CertificateView, EchoedFilters} from './contracts'
import {err, ok, type TransparencyResult} from './errors'
import {echoFilters, toCertificateSearchFilter} from './search'

export type CertificateListing<TItem> = {
  items: TItem[]
  page: number
  limit: number
  total: number
  total_pages: number
  filters: EchoedFilters
}

const DEFAULT_ENTRY_LIMIT = 200

const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return 'Unexpected error'
}

export const toPublicCertificate = (certificate: Certificate): PublicCertificate => ({
  fingerprint: certificate.fingerprint,
  type: certificate.type,
  subject_dn: certificate.subject_dn,
  issuer_dn: certificate.issuer_dn,
  serial_number: certificate.serial_number,
  not_before: certificate.not_before,
  not_after: certificate.not_after,
  issued_at: certificate.issued_at,
  revoked_at: certificate.revoked_at,
  revocation_reason: certificate.revocation_reason
})

export class TransparencyLog {
  public constructor(private readonly dependencies: {repository: CertificateRepository}) {}

  public async list(input: {
    query: CertificateQuery
    view: 'public'
    ownerSubject?: string
  }): Promise<TransparencyResult<CertificateListing<PublicCertificate>>>
  public async list(input: {
    query: CertificateQuery
    view: 'full'
    ownerSubject?: string
  }): Promise<TransparencyResult<CertificateListing<Certificate>>>
  public async list({
    query,
    view,
    ownerSubject
  }: {
    query: CertificateQuery
    view: CertificateView
    ownerSubject?: string
  }): Promise<TransparencyResult<CertificateListing<Certificate | PublicCertificate>>> {
    let result: Awaited<ReturnType<CertificateRepository['search']>>
    try {
      result = await this.dependencies.repository.search(
        toCertificateSearchFilter(query, ownerSubject ? {ownerSubject} : {})
      )
    } catch (error) {
      return err('storage_query_failed', toErrorMessage(error))
    }

    return ok({
      items: view === 'public' ? result.items.map(toPublicCertificate) : result.items,
      page: query.page,
      limit: query.limit,
      total: result.total,
      total_pages: Math.ceil(result.total / query.limit),
      filters: echoFilters(query)
    })
  }

  public async entries({
    fingerprint,
    limit = DEFAULT_ENTRY_LIMIT
  }: {
    fingerprint?: string
    limit?: number
  } = {}): Promise<TransparencyResult<CertificateLogEntry[]>> {
    if (fingerprint !== undefined && !FingerprintSchema.safeParse(fingerprint).success) {
      return err('invalid_fingerprint', 'fingerprint must be 64 lowercase hex characters')
    }

    try {
      return ok(
        await this.dependencies.repository.listLogEntries({
          ...(fingerprint ? {fingerprint} : {}),
          limit
        })
      )
    } catch (error) {
      return err('storage_query_failed', toErrorMessage(error))
    }
  }
}
