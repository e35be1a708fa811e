import type {NextFunction, Request, Response} from 'express'
import type {StructuredLogger} from '@ovpn-portal/logging'

import {badRequest} from '../errors'
import {extractCorrelationId, sendError} from '../http'

const MALFORMED_PERCENT_ENCODING = /%(?![0-9A-Fa-f]{2})/u
const DECODE_FAILURE_MESSAGE = /decode param|uri malformed/u

export const hasMalformedPercentEncoding = (value: string) => MALFORMED_PERCENT_ENCODING.test(value)

const isDecodeFailure = (error: unknown) =>
  error instanceof URIError || (error instanceof Error && DECODE_FAILURE_MESSAGE.test(error.message))

const rejectPath = ({
  request,
  response,
  logger,
  stage
}: {
  request: Request
  response: Response
  logger: StructuredLogger
  stage: 'guard' | 'router'
}) => {
  const error = badRequest('path_param_invalid', 'Path parameter encoding is invalid')
  const correlationId = extractCorrelationId(request)
  logger.warn({
    event: 'request.rejected',
    component: 'http.path_encoding',
    message: 'Malformed percent-encoding in request path',
    correlation_id: correlationId,
    reason_code: error.code,
    method: request.method,
    status_code: error.status,
    metadata: {stage}
  })
  sendError({response, status: error.status, error: error.code, message: error.message, correlationId})
}

/** Runs before routing so a broken escape never reaches the service router or a controller. */
export const createPathEncodingGuard =
  ({logger}: {logger: StructuredLogger}) =>
  (request: Request, response: Response, next: NextFunction) => {
    const pathOnly = (request.url ?? '/').split('?', 1)[0] ?? '/'
    if (!hasMalformedPercentEncoding(pathOnly)) {
      next()
      return
    }

    rejectPath({request, response, logger, stage: 'guard'})
  }

/** Express error handler for `:param` values that the router itself fails to decode. */
export const createDecodeErrorHandler =
  ({logger}: {logger: StructuredLogger}) =>
  (error: unknown, request: Request, response: Response, next: NextFunction) => {
    if (!isDecodeFailure(error)) {
      next(error)
      return
    }

    rejectPath({request, response, logger, stage: 'router'})
  }
