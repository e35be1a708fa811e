import {CertificateTypeSchema} from '@ovpn-portal/schemas'
import {z} from 'zod'

export const DEFAULT_PAGE_LIMIT = 25
export const MAX_PAGE_LIMIT = 100
export const MAX_PAGE = 10_000
export const MAX_SUBJECT_LENGTH = 128

const DateOnlySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/u)

export const CertificateQuerySchema = z
  .object({
    type: CertificateTypeSchema.optional(),
    subject: z.string().min(1).max(MAX_SUBJECT_LENGTH).optional(),
    from_date: DateOnlySchema.optional(),
    to_date: DateOnlySchema.optional(),
    include_revoked: z.boolean(),
    page: z.number().int().min(1).max(MAX_PAGE),
    limit: z.number().int().min(1).max(MAX_PAGE_LIMIT)
  })
  .strict()
export type CertificateQuery = z.infer<typeof CertificateQuerySchema>

export type {EchoedFilters} from '@ovpn-portal/schemas'

export type CertificateView = 'full' | 'public'
