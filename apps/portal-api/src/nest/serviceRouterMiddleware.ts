import type {NextFunction, Request, Response} from 'express'
import type {StructuredLogger} from '@ovpn-portal/logging'

import type {ServiceConfig} from '../config'
import {serviceRouteUnavailable} from '../errors'
import {extractCorrelationId, sendError, sendRedirect} from '../http'
import {classifyRoute, decideRoute} from '../serviceRouter'

const splitUrl = (rawUrl: string | undefined) => {
  const value = rawUrl ?? '/'
  const queryStart = value.indexOf('?')
  if (queryStart === -1) {
    return {path: value, query: ''}
  }

  return {path: value.slice(0, queryStart), query: value.slice(queryStart)}
}

export const createServiceRouterMiddleware = ({
  config,
  logger
}: {
  config: Pick<ServiceConfig, 'service'>
  logger: StructuredLogger
}) => {
  const counterparts = {
    ...(config.service.userServiceUrl ? {userServiceUrl: config.service.userServiceUrl} : {}),
    ...(config.service.adminServiceUrl ? {adminServiceUrl: config.service.adminServiceUrl} : {})
  }

  return (request: Request, response: Response, next: NextFunction) => {
    const {path, query} = splitUrl(request.url)
    const scope = classifyRoute(path)
    const decision = decideRoute({
      mode: config.service.mode,
      scope,
      method: request.method,
      path,
      query,
      counterparts
    })

    if (decision.action === 'serve') {
      next()
      return
    }

    const correlationId = extractCorrelationId(request)
    if (decision.action === 'redirect') {
      logger.info({
        event: 'service_router.redirected',
        component: 'http.service_router',
        message: 'Route redirected to counterpart service',
        correlation_id: correlationId,
        route: path,
        method: request.method,
        status_code: decision.status,
        metadata: {scope, mode: config.service.mode}
      })
      sendRedirect({response, status: decision.status, location: decision.location, correlationId})
      return
    }

    const error = serviceRouteUnavailable()
    logger.warn({
      event: 'service_router.unavailable',
      component: 'http.service_router',
      message: 'Route is not served by this instance',
      correlation_id: correlationId,
      reason_code: error.code,
      route: path,
      method: request.method,
      status_code: error.status,
      metadata: {scope, mode: config.service.mode}
    })
    sendError({
      response,
      status: error.status,
      error: error.code,
      message: error.message,
      correlationId,
      headers: error.headers
    })
  }
}
