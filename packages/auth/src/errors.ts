export const authFlowErrorCodes = [
  'invalid_state',
  'nonce_mismatch',
  'session_expired',
  'id_token_invalid',
  'provider_rejected',
  'upstream_timeout',
  'malformed_input'
] as const;

export type AuthFlowErrorCode = (typeof authFlowErrorCodes)[number];

export class AuthFlowError extends Error {
  public readonly code: AuthFlowErrorCode;

  public constructor(code: AuthFlowErrorCode, message: string) {
    super(message);
    this.name = 'AuthFlowError';
    this.code = code;
  }
}

export const isAuthFlowError = (value: unknown): value is AuthFlowError => value instanceof AuthFlowError;

export type CsrfErrorCode = 'missing_token' | 'token_mismatch';
export type PskErrorCode = 'invalid' | 'expired' | 'wrong_type';

export type AuthSuccess<T> = {ok: true; value: T};
export type AuthFailure<TCode extends string> = {ok: false; error: {code: TCode; message: string}};
export type AuthResult<T, TCode extends string> = AuthSuccess<T> | AuthFailure<TCode>;

export const ok = <T>(value: T): AuthSuccess<T> => ({ok: true, value});

export const err = <TCode extends string>(code: TCode, message: string): AuthFailure<TCode> => ({
  ok: false,
  error: {code, message}
});
