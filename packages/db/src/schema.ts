import type {CertificateLogEvent, CertificateType, PskType, RevocationReason} from '@ovpn-portal/schemas';
import {bigserial, index, pgTable, text, timestamp, uuid, varchar} from 'drizzle-orm/pg-core';

export const certificates = pgTable(
  'certificates',
  {
    fingerprint: varchar('fingerprint', {length: 64}).primaryKey(),
    certificateType: varchar('certificate_type', {length: 16}).$type<CertificateType>().notNull(),
    subjectDn: text('subject_dn').notNull(),
    issuerDn: text('issuer_dn').notNull(),
    serialNumber: varchar('serial_number', {length: 128}).notNull(),
    ownerSubject: varchar('owner_subject', {length: 256}),
    notBefore: timestamp('not_before', {withTimezone: true, mode: 'date'}).notNull(),
    notAfter: timestamp('not_after', {withTimezone: true, mode: 'date'}).notNull(),
    issuedAt: timestamp('issued_at', {withTimezone: true, mode: 'date'}).notNull(),
    revokedAt: timestamp('revoked_at', {withTimezone: true, mode: 'date'}),
    revocationReason: varchar('revocation_reason', {length: 32}).$type<RevocationReason>()
  },
  table => ({
    ownerIdx: index('certificates_owner_subject_idx').on(table.ownerSubject),
    issuedAtIdx: index('certificates_issued_at_idx').on(table.issuedAt)
  })
);

export const certificateLogEntries = pgTable(
  'certificate_log_entries',
  {
    entryId: uuid('entry_id').primaryKey(),
    sequence: bigserial('sequence', {mode: 'number'}).notNull(),
    event: varchar('event', {length: 16}).$type<CertificateLogEvent>().notNull(),
    fingerprint: varchar('fingerprint', {length: 64})
      .notNull()
      .references(() => certificates.fingerprint),
    certificateType: varchar('certificate_type', {length: 16}).$type<CertificateType>().notNull(),
    subjectDn: text('subject_dn').notNull(),
    actor: varchar('actor', {length: 256}).notNull(),
    reason: varchar('reason', {length: 32}).$type<RevocationReason>(),
    recordedAt: timestamp('recorded_at', {withTimezone: true, mode: 'date'}).notNull()
  },
  table => ({
    fingerprintIdx: index('certificate_log_entries_fingerprint_idx').on(table.fingerprint),
    sequenceIdx: index('certificate_log_entries_sequence_idx').on(table.sequence)
  })
);

export const preSharedKeys = pgTable('pre_shared_keys', {
  pskId: uuid('psk_id').primaryKey(),
  secretHash: varchar('secret_hash', {length: 64}).notNull().unique(),
  description: varchar('description', {length: 255}).notNull(),
  pskType: varchar('psk_type', {length: 16}).$type<PskType>().notNull(),
  templateSet: varchar('template_set', {length: 64}).notNull(),
  createdBy: varchar('created_by', {length: 256}).notNull(),
  createdAt: timestamp('created_at', {withTimezone: true, mode: 'date'}).notNull(),
  expiresAt: timestamp('expires_at', {withTimezone: true, mode: 'date'}),
  revokedAt: timestamp('revoked_at', {withTimezone: true, mode: 'date'}),
  lastUsedAt: timestamp('last_used_at', {withTimezone: true, mode: 'date'})
});

export const portalSchema = {certificates, certificateLogEntries, preSharedKeys};

export type CertificateRow = typeof certificates.$inferSelect;
export type CertificateLogEntryRow = typeof certificateLogEntries.$inferSelect;
export type PreSharedKeyRow = typeof preSharedKeys.$inferSelect;
