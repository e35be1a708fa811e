import type {
  Certificate,
  CertificateLogEntry,
  CertificateType,
  PskCredential,
  PskRecord,
  RevocationReason
} from '@ovpn-portal/schemas';

export type CertificateSearchFilter = {
  type?: CertificateType;
  // Case-insensitive substring of the subject DN; matched literally.
  subject?: string;
  ownerSubject?: string;
  issuedFrom?: Date;
  // Exclusive upper bound.
  issuedBefore?: Date;
  includeRevoked: boolean;
  page: number;
  limit: number;
};

export type CertificateSearchResult = {
  items: Certificate[];
  total: number;
};

export type RecordIssuedCertificateInput = {
  certificate: Certificate;
  actor: string;
};

export type RevokeCertificateInput = {
  fingerprint: string;
  reason: RevocationReason;
  actor: string;
  revokedAt: Date;
};

export type RevokeCertificateResult =
  | {status: 'revoked'; certificate: Certificate; entry: CertificateLogEntry}
  | {status: 'already_revoked'; certificate: Certificate}
  | {status: 'not_found'};

export type CertificateRepository = {
  // Persists the certificate and its `issued` log entry atomically.
  recordIssued: (input: RecordIssuedCertificateInput) => Promise<CertificateLogEntry>;
  findByFingerprint: (fingerprint: string) => Promise<Certificate | null>;
  search: (filter: CertificateSearchFilter) => Promise<CertificateSearchResult>;
  // Compare-and-set on revoked_at; the log entry is written only by the caller that flips it.
  revoke: (input: RevokeCertificateInput) => Promise<RevokeCertificateResult>;
  listLogEntries: (input: {fingerprint?: string; limit: number}) => Promise<CertificateLogEntry[]>;
};

export type CreatePskInput = {
  record: PskRecord;
  secretHash: string;
};

export type PskRepository = {
  create: (input: CreatePskInput) => Promise<PskRecord>;
  findById: (pskId: string) => Promise<PskRecord | null>;
  findCredentialByHash: (secretHash: string) => Promise<PskCredential | null>;
  list: () => Promise<PskRecord[]>;
  revoke: (input: {pskId: string; revokedAt: Date}) => Promise<PskRecord | null>;
  touchLastUsed: (input: {pskId: string; usedAt: Date}) => Promise<void>;
};
