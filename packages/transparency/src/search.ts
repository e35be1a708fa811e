import {CertificateTypeSchema} from '@ovpn-portal/schemas'
import type {CertificateSearchFilter} from '@ovpn-portal/db'

import {
  CertificateQuerySchema,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE,
  MAX_PAGE_LIMIT,
  MAX_SUBJECT_LENGTH,
  type CertificateQuery,
  type EchoedFilters
} from './contracts'

const TRUTHY_FLAGS = new Set(['true', '1', 'on', 'yes'])
const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;'
}
const DAY_MS = 24 * 60 * 60 * 1000

const readString = (raw: Record<string, unknown>, key: string): string | undefined => {
  const value = raw[key]
  if (typeof value === 'string') {
    return value
  }

  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0]
  }

  return undefined
}

const parsePositiveInteger = (value: string | undefined, fallback: number, max: number) => {
  const trimmed = value?.trim()
  if (!trimmed || !/^\d{1,12}$/u.test(trimmed)) {
    return fallback
  }

  const parsed = Number.parseInt(trimmed, 10)
  if (parsed <= 0) {
    return fallback
  }

  return Math.min(parsed, max)
}

// Calendar dates only; values such as 2026-02-30 do not survive the round trip.
const parseDateOnly = (value: string | undefined) => {
  const trimmed = value?.trim()
  if (!trimmed || !/^\d{4}-\d{2}-\d{2}$/u.test(trimmed)) {
    return undefined
  }

  const parsed = new Date(`${trimmed}T00:00:00.000Z`)
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== trimmed) {
    return undefined
  }

  return trimmed
}

export const escapeHtml = (value: string) => value.replace(/[&<>"']/gu, character => HTML_ESCAPES[character] ?? character)

export const normalizeCertificateQuery = (raw: Record<string, unknown>): CertificateQuery => {
  const type = CertificateTypeSchema.safeParse(readString(raw, 'type')?.trim().toLowerCase())
  const subject = readString(raw, 'subject')?.trim().slice(0, MAX_SUBJECT_LENGTH)
  let fromDate = parseDateOnly(readString(raw, 'from_date'))
  let toDate = parseDateOnly(readString(raw, 'to_date'))

  if (fromDate && toDate && fromDate > toDate) {
    ;[fromDate, toDate] = [toDate, fromDate]
  }

  return CertificateQuerySchema.parse({
    ...(type.success ? {type: type.data} : {}),
    ...(subject ? {subject} : {}),
    ...(fromDate ? {from_date: fromDate} : {}),
    ...(toDate ? {to_date: toDate} : {}),
    include_revoked: TRUTHY_FLAGS.has(readString(raw, 'include_revoked')?.trim().toLowerCase() ?? ''),
    page: parsePositiveInteger(readString(raw, 'page'), 1, MAX_PAGE),
    limit: parsePositiveInteger(readString(raw, 'limit'), DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT)
  })
}

export const toCertificateSearchFilter = (
  query: CertificateQuery,
  {ownerSubject}: {ownerSubject?: string} = {}
): CertificateSearchFilter => ({
  ...(query.type ? {type: query.type} : {}),
  ...(query.subject ? {subject: query.subject} : {}),
  ...(ownerSubject ? {ownerSubject} : {}),
  ...(query.from_date ? {issuedFrom: new Date(`${query.from_date}T00:00:00.000Z`)} : {}),
  // to_date is inclusive of the whole day.
  ...(query.to_date ? {issuedBefore: new Date(Date.parse(`${query.to_date}T00:00:00.000Z`) + DAY_MS)} : {}),
  includeRevoked: query.include_revoked,
  page: query.page,
  limit: query.limit
})

export const echoFilters = (query: CertificateQuery): EchoedFilters => ({
  type: query.type ?? null,
  subject_html: query.subject ? escapeHtml(query.subject) : null,
  from_date: query.from_date ?? null,
  to_date: query.to_date ?? null,
  include_revoked: query.include_revoked
})
