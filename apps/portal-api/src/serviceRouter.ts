import type {ServiceMode} from './config'

export type RouteScope = 'shared' | 'user' | 'admin'

export type ServiceCounterparts = {
  userServiceUrl?: string
  adminServiceUrl?: string
}

export type RouteDecision =
  | {action: 'serve'}
  | {action: 'redirect'; status: 301; location: string}
  | {action: 'unavailable'}

const SERVE: RouteDecision = {action: 'serve'}
const UNAVAILABLE: RouteDecision = {action: 'unavailable'}
const REDIRECTABLE_METHODS = new Set(['GET', 'HEAD'])

// Express matches routes case-insensitively, so scope is decided on the lower-cased path.
const matchesSegment = (path: string, prefix: string) => {
  const canonical = path.toLowerCase()
  return canonical === prefix || canonical.startsWith(`${prefix}/`)
}

export const classifyRoute = (path: string): RouteScope => {
  if (matchesSegment(path, '/profile')) {
    return 'user'
  }

  if (matchesSegment(path, '/admin') || matchesSegment(path, '/certificates') || matchesSegment(path, '/api')) {
    return 'admin'
  }

  return 'shared'
}

const redirectTo = ({baseUrl, path, query}: {baseUrl: string; path: string; query: string}): RouteDecision => ({
  action: 'redirect',
  status: 301,
  location: `${baseUrl}${path}${query}`
})

/**
 * `query` is the raw search string including its leading `?` (or empty) and is
 * forwarded untouched. Only GET and HEAD are redirected; a 301 would drop a body.
 */
export const decideRoute = ({
  mode,
  scope,
  method,
  path,
  query,
  counterparts
}: {
  mode: ServiceMode
  scope: RouteScope
  method: string
  path: string
  query: string
  counterparts: ServiceCounterparts
}): RouteDecision => {
  if (mode === 'combined' || scope === 'shared' || scope === mode) {
    return SERVE
  }

  if (!REDIRECTABLE_METHODS.has(method.toUpperCase())) {
    return UNAVAILABLE
  }

  if (mode === 'user') {
    if (matchesSegment(path, '/api') || !counterparts.adminServiceUrl) {
      return UNAVAILABLE
    }

    return redirectTo({baseUrl: counterparts.adminServiceUrl, path, query})
  }

  if (!counterparts.userServiceUrl) {
    return UNAVAILABLE
  }

  return redirectTo({baseUrl: counterparts.userServiceUrl, path, query})
}
