export type DbErrorCode =
  | 'validation_error'
  | 'not_found'
  | 'unique_violation'
  | 'conflict'
  | 'integrity_violation'
  | 'unexpected_error'

export class DbRepositoryError extends Error {
  public readonly code: DbErrorCode

  public constructor(code: DbErrorCode, message: string) {
    super(message)
    this.name = 'DbRepositoryError'
    this.code = code
  }
}

export const isDbRepositoryError = (value: unknown): value is DbRepositoryError => value instanceof DbRepositoryError

const SQLSTATE_ERRORS: Record<string, {code: DbErrorCode; message: string}> = {
  '23505': {code: 'unique_violation', message: 'Unique constraint violated'},
  '23503': {code: 'integrity_violation', message: 'Relational integrity violation'},
  '23502': {code: 'integrity_violation', message: 'Relational integrity violation'},
  '40001': {code: 'conflict', message: 'Concurrent update conflict'},
  '40P01': {code: 'conflict', message: 'Concurrent update conflict'}
}

const codeOf = (value: unknown): string | null =>
  typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string' ? value.code : null

// drizzle wraps the driver error in `cause`
const readSqlState = (error: unknown): string | null => {
  const direct = codeOf(error)
  if (direct !== null || typeof error !== 'object' || error === null || !('cause' in error)) {
    return direct
  }
  return codeOf(error.cause)
}

export const mapDatabaseError = (error: unknown): never => {
  if (error instanceof DbRepositoryError) {
    throw error
  }

  const sqlState = readSqlState(error)
  const mapped = sqlState === null ? undefined : SQLSTATE_ERRORS[sqlState]
  throw mapped
    ? new DbRepositoryError(mapped.code, mapped.message)
    : new DbRepositoryError('unexpected_error', 'Unexpected database error')
}
