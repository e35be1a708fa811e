import type {AuthFlowErrorCode, CsrfErrorCode, PskErrorCode} from '@ovpn-portal/auth'

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 415 | 502 | 503 | 504

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus
  public readonly headers: Record<string, string>

  public constructor({
    code,
    message,
    status,
    headers
  }: {
    code: string
    message: string
    status: ErrorStatus
    headers?: Record<string, string>
  }) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    this.headers = headers ?? {}
  }
}

export const badRequest = (code: string, message: string) => new AppError({code, message, status: 400})

export const unauthorized = (code: string, message: string) => new AppError({code, message, status: 401})

export const forbidden = (code: string, message: string) => new AppError({code, message, status: 403})

export const notFound = (code: string, message: string) => new AppError({code, message, status: 404})

export const conflict = (code: string, message: string) => new AppError({code, message, status: 409})

export const unsupportedMediaType = (code: string, message: string) =>
  new AppError({code, message, status: 415})

export const badGateway = (code: string, message: string) => new AppError({code, message, status: 502})

export const serviceUnavailable = (code: string, message: string) =>
  new AppError({code, message, status: 503})

export const gatewayTimeout = (code: string, message: string) =>
  new AppError({code, message, status: 504, headers: {'retry-after': '5'}})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

// Every owner/identifier miss answers with this exact body.
export const certificateNotFound = () => notFound('certificate_not_found', 'Certificate not found')

export const serviceRouteUnavailable = () =>
  new AppError({
    code: 'service_route_unavailable',
    message: 'This route is not served by this service instance',
    status: 403,
    headers: {'x-service-route': 'unavailable'}
  })

export const fromAuthFlowError = (code: AuthFlowErrorCode): AppError => {
  switch (code) {
    case 'invalid_state':
      return badRequest('auth_invalid_state', 'Login request is invalid or has already been used')
    case 'nonce_mismatch':
      return badRequest('auth_nonce_mismatch', 'Login response does not match the login request')
    case 'session_expired':
      return unauthorized('auth_session_expired', 'Session has expired')
    case 'upstream_timeout':
      return gatewayTimeout('upstream_timeout', 'Identity provider did not respond in time')
    case 'provider_rejected':
    case 'id_token_invalid':
      return badGateway('upstream_rejected', 'Identity provider rejected the login')
    case 'malformed_input':
      return badRequest('request_invalid', 'Login response is malformed')
  }
}

export const fromCsrfError = (code: CsrfErrorCode): AppError =>
  code === 'missing_token'
    ? badRequest('csrf_token_missing', 'CSRF token is missing')
    : badRequest('csrf_token_invalid', 'CSRF token is invalid')

// Invalid and expired keys share one body.
export const fromPskError = (code: PskErrorCode): AppError =>
  code === 'wrong_type'
    ? forbidden('psk_wrong_type', 'Pre-shared key is not valid for this operation')
    : unauthorized('psk_invalid', 'Pre-shared key is invalid or expired')
