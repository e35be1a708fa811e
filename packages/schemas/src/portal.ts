import {z} from 'zod'

export const RoleSchema = z.enum(['user', 'admin'])
export type Role = z.infer<typeof RoleSchema>

export const CertificateTypeSchema = z.enum(['client', 'server', 'computer'])
export type CertificateType = z.infer<typeof CertificateTypeSchema>

export const PskTypeSchema = z.enum(['server', 'computer'])
export type PskType = z.infer<typeof PskTypeSchema>

export const RevocationReasonSchema = z.enum([
  'unspecified',
  'key_compromise',
  'superseded',
  'cessation_of_operation',
  'affiliation_changed'
])
export type RevocationReason = z.infer<typeof RevocationReasonSchema>

export const FingerprintSchema = z.string().regex(/^[a-f0-9]{64}$/u)

export const CertificateSchema = z
  .object({
    fingerprint: FingerprintSchema,
    type: CertificateTypeSchema,
    subject_dn: z.string().min(1),
    issuer_dn: z.string().min(1),
    serial_number: z.string().min(1),
    owner_subject: z.string().min(1).nullable(),
    not_before: z.iso.datetime({offset: true}),
    not_after: z.iso.datetime({offset: true}),
    issued_at: z.iso.datetime({offset: true}),
    revoked_at: z.iso.datetime({offset: true}).nullable(),
    revocation_reason: RevocationReasonSchema.nullable()
  })
  .strict()
export type Certificate = z.infer<typeof CertificateSchema>

export const PublicCertificateSchema = CertificateSchema.omit({owner_subject: true})
export type PublicCertificate = z.infer<typeof PublicCertificateSchema>

export const CertificateLogEventSchema = z.enum(['issued', 'revoked'])
export type CertificateLogEvent = z.infer<typeof CertificateLogEventSchema>

export const CertificateLogEntrySchema = z
  .object({
    entry_id: z.string().uuid(),
    sequence: z.number().int().positive(),
    event: CertificateLogEventSchema,
    fingerprint: FingerprintSchema,
    certificate_type: CertificateTypeSchema,
    subject_dn: z.string().min(1),
    actor: z.string().min(1),
    reason: RevocationReasonSchema.nullable(),
    recorded_at: z.iso.datetime({offset: true})
  })
  .strict()
export type CertificateLogEntry = z.infer<typeof CertificateLogEntrySchema>

// Search terms as applied; the subject is echoed only in its HTML-escaped form.
export const EchoedFiltersSchema = z
  .object({
    type: CertificateTypeSchema.nullable(),
    subject_html: z.string().nullable(),
    from_date: z.string().nullable(),
    to_date: z.string().nullable(),
    include_revoked: z.boolean()
  })
  .strict()
export type EchoedFilters = z.infer<typeof EchoedFiltersSchema>

export const CertificatePageSchema = <TItem extends z.ZodType>(item: TItem) =>
  z
    .object({
      items: z.array(item),
      page: z.number().int().positive(),
      limit: z.number().int().positive(),
      total: z.number().int().gte(0),
      total_pages: z.number().int().gte(0),
      filters: EchoedFiltersSchema
    })
    .strict()

export const PskRecordSchema = z
  .object({
    psk_id: z.string().uuid(),
    description: z.string().min(1).max(255),
    psk_type: PskTypeSchema,
    template_set: z.string().min(1),
    created_by: z.string().min(1),
    created_at: z.iso.datetime({offset: true}),
    expires_at: z.iso.datetime({offset: true}).nullable(),
    revoked_at: z.iso.datetime({offset: true}).nullable(),
    last_used_at: z.iso.datetime({offset: true}).nullable()
  })
  .strict()
export type PskRecord = z.infer<typeof PskRecordSchema>

export const PskCreateRequestSchema = z
  .object({
    description: z.string().trim().min(1).max(255),
    psk_type: PskTypeSchema.default('server'),
    template_set: z.string().trim().min(1).max(64).default('default'),
    expires_at: z.iso.datetime({offset: true}).optional()
  })
  .strict()
export type PskCreateRequest = z.infer<typeof PskCreateRequestSchema>

export const PskCreateResponseSchema = z
  .object({
    psk: PskRecordSchema,
    secret: z.string().min(32)
  })
  .strict()

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string().min(1),
    correlation_id: z.string().min(1)
  })
  .strict()
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

export const HealthResponseSchema = z
  .object({
    status: z.literal('healthy'),
    service: z.string().min(1),
    mode: z.enum(['combined', 'user', 'admin'])
  })
  .strict()

export const SessionResponseSchema = z
  .object({
    subject: z.string().min(1),
    display_name: z.string().min(1),
    roles: z.array(RoleSchema),
    issued_at: z.iso.datetime({offset: true}),
    expires_at: z.iso.datetime({offset: true}),
    csrf_token: z.string().min(1)
  })
  .strict()

export const BundleFileSchema = z
  .object({
    name: z.string().min(1),
    content: z.string()
  })
  .strict()

export const ServerBundleSchema = z
  .object({
    bundle_type: z.literal('server'),
    fingerprint: FingerprintSchema,
    common_name: z.string().min(1),
    files: z.array(BundleFileSchema).min(4)
  })
  .strict()
export type ServerBundle = z.infer<typeof ServerBundleSchema>
