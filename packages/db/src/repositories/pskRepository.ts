import {PskRecordSchema, TokenHashSchema, type PskRecord} from '@ovpn-portal/schemas'
import {and, desc, eq, isNull} from 'drizzle-orm'
import {z} from 'zod'

import type {CreatePskInput, PskRepository} from '../contracts.js'
import {DbRepositoryError, mapDatabaseError} from '../errors.js'
import {preSharedKeys} from '../schema.js'
import type {PortalDatabase} from './certificateRepository.js'
import {toPreSharedKeyRow, toPskCredential, toPskRecord} from './mappers.js'

const PskIdSchema = z.string().uuid()

const assertPskId = (pskId: string) => {
  const parsed = PskIdSchema.safeParse(pskId)
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', 'pskId must be a valid UUID')
  }

  return parsed.data
}

export class PostgresPskRepository implements PskRepository {
  public constructor(private readonly db: PortalDatabase) {}

  public async create({record, secretHash}: CreatePskInput): Promise<PskRecord> {
    const parsedRecord = PskRecordSchema.safeParse(record)
    const parsedHash = TokenHashSchema.safeParse(secretHash)
    if (!parsedRecord.success || !parsedHash.success) {
      throw new DbRepositoryError('validation_error', 'Pre-shared key record is invalid')
    }

    try {
      const [row] = await this.db
        .insert(preSharedKeys)
        .values(toPreSharedKeyRow({record: parsedRecord.data, secretHash: parsedHash.data}))
        .returning()
      if (!row) {
        throw new DbRepositoryError('unexpected_error', 'Pre-shared key was not written')
      }

      return toPskRecord(row)
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async findById(pskId: string) {
    const normalized = assertPskId(pskId)

    try {
      const [row] = await this.db.select().from(preSharedKeys).where(eq(preSharedKeys.pskId, normalized)).limit(1)
      return row ? toPskRecord(row) : null
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async findCredentialByHash(secretHash: string) {
    const parsedHash = TokenHashSchema.safeParse(secretHash)
    if (!parsedHash.success) {
      return null
    }

    try {
      const [row] = await this.db
        .select()
        .from(preSharedKeys)
        .where(eq(preSharedKeys.secretHash, parsedHash.data))
        .limit(1)
      return row ? toPskCredential(row) : null
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async list() {
    try {
      const rows = await this.db.select().from(preSharedKeys).orderBy(desc(preSharedKeys.createdAt))
      return rows.map(toPskRecord)
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async revoke({pskId, revokedAt}: {pskId: string; revokedAt: Date}) {
    const normalized = assertPskId(pskId)

    try {
      const [updated] = await this.db
        .update(preSharedKeys)
        .set({revokedAt})
        .where(and(eq(preSharedKeys.pskId, normalized), isNull(preSharedKeys.revokedAt)))
        .returning()
      if (updated) {
        return toPskRecord(updated)
      }

      return await this.findById(normalized)
    } catch (error) {
      return mapDatabaseError(error)
    }
  }

  public async touchLastUsed({pskId, usedAt}: {pskId: string; usedAt: Date}) {
    const normalized = assertPskId(pskId)

    try {
      await this.db.update(preSharedKeys).set({lastUsedAt: usedAt}).where(eq(preSharedKeys.pskId, normalized))
    } catch (error) {
      mapDatabaseError(error)
    }
  }
}
