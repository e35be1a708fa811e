import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorResponseSchema} from '@ovpn-portal/schemas'
import type {z} from 'zod'

import {badRequest, unsupportedMediaType} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
}

const MAX_FORM_FIELDS = 64
const COOKIE_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/u

type BodyKind = 'json' | 'form'

const resolveBodyKind = (contentTypeHeader: string | undefined): BodyKind | undefined => {
  if (!contentTypeHeader) {
    return undefined
  }

  const normalized = contentTypeHeader.toLowerCase()
  if (normalized.includes('application/json')) {
    return 'json'
  }
  if (normalized.includes('application/x-www-form-urlencoded')) {
    return 'form'
  }

  return undefined
}

const hasPotentialBody = (request: IncomingMessage) =>
  Boolean(request.headers['content-length'] || request.headers['transfer-encoding'])

export const readHeader = (request: IncomingMessage, name: string) => {
  const header = request.headers[name]
  return Array.isArray(header) ? header[0] : header
}

export const extractCorrelationId = (request: IncomingMessage) => {
  const value = readHeader(request, 'x-correlation-id')
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

const readBodyBuffer = async ({request, maxBodyBytes}: {request: IncomingMessage; maxBodyBytes: number}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

const parseJsonText = (text: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }
}

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Reads a JSON or urlencoded body into a flat field record. Nothing is validated
 * beyond the encoding so the CSRF check can run before any schema or business logic.
 */
export const readBodyFields = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}): Promise<Record<string, unknown>> => {
  if (!hasPotentialBody(request)) {
    return {}
  }

  const kind = resolveBodyKind(request.headers['content-type'])
  if (!kind) {
    throw unsupportedMediaType(
      'content_type_invalid',
      'Content-Type must be application/json or application/x-www-form-urlencoded'
    )
  }

  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    return {}
  }

  if (kind === 'json') {
    const parsed = parseJsonText(raw.toString('utf8'))
    if (!isPlainRecord(parsed)) {
      throw badRequest('request_invalid', 'Request body must be a JSON object')
    }

    return parsed
  }

  const params = new URLSearchParams(raw.toString('utf8'))
  const fields: Record<string, unknown> = {}
  let count = 0
  for (const [key, value] of params) {
    count += 1
    if (count > MAX_FORM_FIELDS) {
      throw badRequest('request_invalid', 'Request body has too many fields')
    }

    fields[key] = value
  }

  return fields
}

export const validateBodyFields = <TSchema extends z.ZodType>({
  fields,
  schema
}: {
  fields: Record<string, unknown>
  schema: TSchema
}): z.infer<TSchema> => {
  const {csrf_token: _csrfToken, ...rest} = fields
  const parsed = schema.safeParse(rest)
  if (!parsed.success) {
    const tooLong = parsed.error.issues.some(issue => issue.code === 'too_big')
    throw badRequest(
      tooLong ? 'field_too_long' : 'request_invalid',
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
    )
  }

  return parsed.data
}

export const readCookie = (request: IncomingMessage, name: string): string | undefined => {
  const header = request.headers.cookie
  if (!header) {
    return undefined
  }

  for (const part of header.split(';')) {
    const separator = part.indexOf('=')
    if (separator <= 0) {
      continue
    }

    if (part.slice(0, separator).trim() === name) {
      const value = part.slice(separator + 1).trim()
      return value.length > 0 ? value : undefined
    }
  }

  return undefined
}

export type CookieOptions = {
  secure: boolean
  maxAgeSeconds?: number
}

export const serializeCookie = ({name, value, options}: {name: string; value: string; options: CookieOptions}) => {
  if (!COOKIE_NAME_PATTERN.test(name) || !/^[A-Za-z0-9_-]*$/u.test(value)) {
    throw new Error('cookie_value_invalid')
  }

  return [
    `${name}=${value}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Lax',
    ...(options.maxAgeSeconds !== undefined ? [`Max-Age=${options.maxAgeSeconds}`] : []),
    ...(options.secure ? ['Secure'] : [])
  ].join('; ')
}

export const clearCookie = ({name, secure}: {name: string; secure: boolean}) =>
  serializeCookie({name, value: '', options: {secure, maxAgeSeconds: 0}})

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

type ResponseHeaders = Record<string, string | string[]>

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: ResponseHeaders
}) => {
  const body = serialize(payload)

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId,
  headers
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
  headers?: ResponseHeaders
}) => {
  const payload = ErrorResponseSchema.parse({
    error,
    message,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    payload,
    correlationId,
    ...(headers ? {headers} : {})
  })
}

export const sendRedirect = ({
  response,
  status = 302,
  location,
  correlationId,
  headers
}: {
  response: ServerResponse
  status?: 301 | 302 | 303
  location: string
  correlationId: string
  headers?: ResponseHeaders
}) => {
  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    location,
    'content-length': '0',
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end()
}

export const sendAttachment = ({
  response,
  correlationId,
  filename,
  contentType,
  content
}: {
  response: ServerResponse
  correlationId: string
  filename: string
  contentType: string
  content: string
}) => {
  const body = Buffer.from(content, 'utf8')
  const safeFilename = filename.replace(/[^A-Za-z0-9._-]/gu, '_')

  response.writeHead(200, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': contentType,
    'content-length': String(body.length),
    'content-disposition': `attachment; filename="${safeFilename}"`,
    'x-correlation-id': correlationId
  })

  response.end(body)
}

export const wantsJson = (request: IncomingMessage, pathname: string) => {
  if (pathname.startsWith('/api/')) {
    return true
  }

  const accept = readHeader(request, 'accept')?.toLowerCase() ?? ''
  return accept.includes('application/json') && !accept.includes('text/html')
}
