export const transparencyErrorCodes = ['invalid_fingerprint', 'storage_query_failed'] as const

export type TransparencyErrorCode = (typeof transparencyErrorCodes)[number]

export type TransparencyError = {
  code: TransparencyErrorCode
  message: string
}

export type TransparencySuccess<T> = {ok: true; value: T}
export type TransparencyFailure = {ok: false; error: TransparencyError}
export type TransparencyResult<T> = TransparencySuccess<T> | TransparencyFailure

export const ok = <T>(value: T): TransparencySuccess<T> => ({ok: true, value})

export const err = (code: TransparencyErrorCode, message: string): TransparencyFailure => ({
  ok: false,
  error: {code, message}
})
