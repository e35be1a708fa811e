import {randomUUID} from 'node:crypto'
import type {IncomingMessage} from 'node:http'

import {Inject, Injectable} from '@nestjs/common'
import type {Request, Response} from 'express'
import {extractBearerCredential, isAuthFlowError, verifyCsrfToken} from '@ovpn-portal/auth'
import {
  createNoopLogger,
  runWithLogContext,
  setLogContextFields,
  type StructuredLogger
} from '@ovpn-portal/logging'
import type {PskType, SessionRecord} from '@ovpn-portal/schemas'
import type {TransparencyResult} from '@ovpn-portal/transparency'

import {
  AccessDeniedError,
  isAccessDeniedError,
  renderAccessDenial,
  type PskPrincipal,
  type SessionPrincipal
} from '../accessControl'
import type {ServiceConfig} from '../config'
import {
  badRequest,
  certificateNotFound,
  fromAuthFlowError,
  fromCsrfError,
  isAppError,
  serviceUnavailable,
  type AppError
} from '../errors'
import {
  clearCookie,
  extractCorrelationId,
  readBodyFields,
  readCookie,
  readHeader,
  sendError,
  sendRedirect,
  serializeCookie,
  wantsJson
} from '../http'
import type {PortalServices} from '../services'
import {PORTAL_CONFIG, PORTAL_LOGGER, PORTAL_SERVICES} from './tokens'

export type RequestHandlerContext = {
  correlationId: string
  method: string
  pathname: string
  url: URL
}

export type AuthenticatedSession = {
  session: SessionRecord
  principal: SessionPrincipal
}

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/'
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? ''
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/'
}

const parseUrl = (request: IncomingMessage) => {
  try {
    const host = request.headers.host ?? 'localhost'
    return new URL(request.url ?? '/', `http://${host}`)
  } catch {
    throw badRequest('request_url_invalid', 'Request URL is invalid')
  }
}

export const toSessionPrincipal = (session: SessionRecord): SessionPrincipal => ({
  kind: 'session',
  subject: session.subject,
  roles: session.roles,
  groups: session.groups
})

const toHandledError = (error: unknown): AppError | undefined => {
  if (isAppError(error)) {
    return error
  }

  if (isAuthFlowError(error)) {
    return fromAuthFlowError(error.code)
  }

  return undefined
}

@Injectable()
export class PortalControllerContext {
  private readonly logger: StructuredLogger

  public constructor(
    @Inject(PORTAL_CONFIG) public readonly config: ServiceConfig,
    @Inject(PORTAL_SERVICES) public readonly services: PortalServices,
    @Inject(PORTAL_LOGGER) logger: StructuredLogger | undefined
  ) {
    this.logger = logger ?? createNoopLogger()
  }

  public get log() {
    return this.logger
  }

  public readSessionToken(request: IncomingMessage) {
    return readCookie(request, this.config.session.cookieName)
  }

  public sessionCookie(token: string) {
    return serializeCookie({
      name: this.config.session.cookieName,
      value: token,
      options: {secure: this.config.session.cookieSecure, maxAgeSeconds: this.config.session.ttlSeconds}
    })
  }

  public clearSessionCookie() {
    return clearCookie({name: this.config.session.cookieName, secure: this.config.session.cookieSecure})
  }

  /** Resolves the session cookie; an absent or expired session is a `not_authenticated` denial. */
  public async requireSession({request}: {request: IncomingMessage}): Promise<AuthenticatedSession> {
    const resolution = await this.services.sessions.resolve(this.readSessionToken(request))
    // A session waiting for the provider logout round-trip no longer authorizes anything.
    if (resolution.status !== 'authenticated' || resolution.session.status !== 'active') {
      throw new AccessDeniedError(
        {effect: 'deny', reason: 'not_authenticated'},
        {sessionExpired: resolution.status === 'expired'}
      )
    }

    const {session} = resolution
    setLogContextFields({subject: session.subject})
    return {session, principal: toSessionPrincipal(session)}
  }

  public async optionalSession({request}: {request: IncomingMessage}) {
    const token = this.readSessionToken(request)
    const resolution = await this.services.sessions.resolve(token)
    return resolution.status === 'authenticated' ? {token, session: resolution.session} : {token, session: null}
  }

  /**
   * Reads the body and checks the CSRF token before anything else looks at it.
   * The token comes from `x-csrftoken` or the `csrf_token` field.
   */
  public async readProtectedBody({
    request,
    session
  }: {
    request: IncomingMessage
    session: SessionRecord
  }): Promise<Record<string, unknown>> {
    const fields = await readBodyFields({request, maxBodyBytes: this.config.maxBodyBytes})
    const fieldToken = fields.csrf_token
    const submitted = readHeader(request, 'x-csrftoken') ?? (typeof fieldToken === 'string' ? fieldToken : undefined)

    const result = verifyCsrfToken({session, submitted})
    if (!result.ok) {
      throw fromCsrfError(result.error.code)
    }

    return fields
  }

  public async authenticatePsk({
    request,
    expectedType
  }: {
    request: IncomingMessage
    expectedType: PskType
  }): Promise<PskPrincipal> {
    const principal = await this.services.psks.authenticate({
      candidate: extractBearerCredential(readHeader(request, 'authorization')),
      expectedType
    })
    setLogContextFields({subject: `psk:${principal.pskId}`})
    return principal
  }

  public async handleRequest({
    request,
    response,
    handler
  }: {
    request: Request
    response: Response
    handler: (context: RequestHandlerContext) => Promise<void> | void
  }) {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const startedAtMs = Date.now()
    const requestMethod = request.method ?? 'GET'

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        method: requestMethod
      },
      async () => {
        const method = requestMethod
        let pathname = '/'
        let search = ''
        let responseReasonCode: string | undefined

        this.logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route: sanitizeRouteForLog({rawUrl: request.url}),
          method: requestMethod
        })

        try {
          const url = parseUrl(request)
          pathname = url.pathname
          search = url.search
          setLogContextFields({
            route: pathname,
            method
          })

          await handler({
            correlationId,
            method,
            pathname,
            url
          })
        } catch (error) {
          if (isAccessDeniedError(error)) {
            responseReasonCode = error.decision.reason
            const denial = renderAccessDenial(error.decision, {
              pathname,
              search,
              json: wantsJson(request, pathname),
              sessionExpired: error.sessionExpired
            })

            this.logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: `Access denied: ${error.decision.reason}`,
              reason_code: error.decision.reason,
              route: pathname,
              method
            })

            if (denial.kind === 'redirect') {
              sendRedirect({
                response,
                status: denial.status,
                location: denial.location,
                correlationId,
                ...(error.sessionExpired ? {headers: {'set-cookie': this.clearSessionCookie()}} : {})
              })
              return
            }

            sendError({
              response,
              status: denial.error.status,
              error: denial.error.code,
              message: denial.error.message,
              correlationId,
              headers: denial.error.headers
            })
            return
          }

          const handled = toHandledError(error)
          if (handled) {
            responseReasonCode = handled.code
            this.logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: `Request rejected: ${handled.code}`,
              reason_code: handled.code,
              route: pathname,
              method
            })

            sendError({
              response,
              status: handled.status,
              error: handled.code,
              message: handled.message,
              correlationId,
              headers: handled.headers
            })
            return
          }

          responseReasonCode = 'internal_error'
          this.logger.error({
            event: 'request.failed',
            component: 'http.server',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            route: pathname,
            method,
            metadata: {
              error
            }
          })

          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          })
        } finally {
          const durationMs = Math.max(0, Date.now() - startedAtMs)
          const statusCode = response.statusCode
          const baseLog = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route: pathname,
            method,
            status_code: statusCode,
            duration_ms: durationMs,
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          }

          if (statusCode >= 500) {
            this.logger.error(baseLog)
          } else if (statusCode >= 400) {
            this.logger.warn(baseLog)
          } else {
            this.logger.info(baseLog)
          }
        }
      }
    )
  }
}

export const unwrapTransparency = <T>(result: TransparencyResult<T>): T => {
  if (result.ok) {
    return result.value
  }

  if (result.error.code === 'invalid_fingerprint') {
    throw certificateNotFound()
  }

  throw serviceUnavailable('storage_unavailable', 'Certificate storage is unavailable')
}
