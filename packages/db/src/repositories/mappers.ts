import {
  CertificateLogEntrySchema,
  CertificateSchema,
  PskCredentialSchema,
  PskRecordSchema,
  type Certificate,
  type CertificateLogEntry,
  type PskCredential,
  type PskRecord
} from '@ovpn-portal/schemas';

import type {CertificateLogEntryRow, CertificateRow, PreSharedKeyRow} from '../schema.js';
import {parseRecord, toIsoString, toNullableIsoString} from '../utils.js';

export const toCertificate = (row: CertificateRow): Certificate =>
  parseRecord(
    CertificateSchema,
    {
      fingerprint: row.fingerprint,
      type: row.certificateType,
      subject_dn: row.subjectDn,
      issuer_dn: row.issuerDn,
      serial_number: row.serialNumber,
      owner_subject: row.ownerSubject,
      not_before: toIsoString(row.notBefore),
      not_after: toIsoString(row.notAfter),
      issued_at: toIsoString(row.issuedAt),
      revoked_at: toNullableIsoString(row.revokedAt),
      revocation_reason: row.revocationReason
    },
    'certificate'
  );

export const toCertificateRow = (certificate: Certificate): CertificateRow => ({
  fingerprint: certificate.fingerprint,
  certificateType: certificate.type,
  subjectDn: certificate.subject_dn,
  issuerDn: certificate.issuer_dn,
  serialNumber: certificate.serial_number,
  ownerSubject: certificate.owner_subject,
  notBefore: new Date(certificate.not_before),
  notAfter: new Date(certificate.not_after),
  issuedAt: new Date(certificate.issued_at),
  revokedAt: certificate.revoked_at ? new Date(certificate.revoked_at) : null,
  revocationReason: certificate.revocation_reason
});

export const toCertificateLogEntry = (row: CertificateLogEntryRow): CertificateLogEntry =>
  parseRecord(
    CertificateLogEntrySchema,
    {
      entry_id: row.entryId,
      sequence: row.sequence,
      event: row.event,
      fingerprint: row.fingerprint,
      certificate_type: row.certificateType,
      subject_dn: row.subjectDn,
      actor: row.actor,
      reason: row.reason,
      recorded_at: toIsoString(row.recordedAt)
    },
    'certificate log entry'
  );

export const toPskRecord = (row: PreSharedKeyRow): PskRecord =>
  parseRecord(
    PskRecordSchema,
    {
      psk_id: row.pskId,
      description: row.description,
      psk_type: row.pskType,
      template_set: row.templateSet,
      created_by: row.createdBy,
      created_at: toIsoString(row.createdAt),
      expires_at: toNullableIsoString(row.expiresAt),
      revoked_at: toNullableIsoString(row.revokedAt),
      last_used_at: toNullableIsoString(row.lastUsedAt)
    },
    'pre-shared key'
  );

export const toPskCredential = (row: PreSharedKeyRow): PskCredential =>
  parseRecord(
    PskCredentialSchema,
    {
      pskId: row.pskId,
      secretHash: row.secretHash,
      description: row.description,
      pskType: row.pskType,
      templateSet: row.templateSet,
      expiresAt: toNullableIsoString(row.expiresAt),
      revokedAt: toNullableIsoString(row.revokedAt)
    },
    'pre-shared key'
  );

export const toPreSharedKeyRow = ({record, secretHash}: {record: PskRecord; secretHash: string}): PreSharedKeyRow => ({
  pskId: record.psk_id,
  secretHash,
  description: record.description,
  pskType: record.psk_type,
  templateSet: record.template_set,
  createdBy: record.created_by,
  createdAt: new Date(record.created_at),
  expiresAt: record.expires_at ? new Date(record.expires_at) : null,
  revokedAt: record.revoked_at ? new Date(record.revoked_at) : null,
  lastUsedAt: record.last_used_at ? new Date(record.last_used_at) : null
});
