import {z} from 'zod'

import {PskTypeSchema, RoleSchema} from './portal'

export const TokenHashSchema = z.string().regex(/^[a-f0-9]{64}$/u)

export const SessionRecordSchema = z
  .object({
    sessionId: z.string().uuid(),
    tokenHash: TokenHashSchema,
    subject: z.string().min(1).max(256),
    displayName: z.string().min(1).max(256),
    email: z.string().min(1).max(320).optional(),
    groups: z.array(z.string().min(1)),
    roles: z.array(RoleSchema).min(1),
    issuedAt: z.iso.datetime({offset: true}),
    expiresAt: z.iso.datetime({offset: true}),
    csrfSecret: z.string().min(32),
    idToken: z.string().min(1).optional(),
    status: z.enum(['active', 'logout_pending'])
  })
  .strict()
export type SessionRecord = z.infer<typeof SessionRecordSchema>

export const OidcExchangeSchema = z
  .object({
    stateId: z.string().min(32).max(128),
    nonce: z.string().min(22),
    codeVerifier: z.string().min(43).max(128),
    codeChallenge: z.string().min(43),
    redirectTarget: z.string().min(1).max(2048),
    createdAt: z.iso.datetime({offset: true}),
    expiresAt: z.iso.datetime({offset: true})
  })
  .strict()
export type OidcExchange = z.infer<typeof OidcExchangeSchema>

export const PskCredentialSchema = z
  .object({
    pskId: z.string().uuid(),
    secretHash: TokenHashSchema,
    description: z.string().min(1).max(255),
    pskType: PskTypeSchema,
    templateSet: z.string().min(1),
    expiresAt: z.iso.datetime({offset: true}).nullable(),
    revokedAt: z.iso.datetime({offset: true}).nullable()
  })
  .strict()
export type PskCredential = z.infer<typeof PskCredentialSchema>
