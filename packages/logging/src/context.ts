import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

// Fields every log line of one request inherits. `subject` is an OIDC subject or `psk:<id>`.
export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    subject: z.string().min(1).max(256).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const requestScope = new AsyncLocalStorage<{context: LogContext}>();

export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  requestScope.run({context: LogContextSchema.parse(context)}, operation);

export const getLogContext = (): LogContext | undefined => requestScope.getStore()?.context;

/** Merges fields into the active request scope; outside a scope this is a no-op returning undefined. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const scope = requestScope.getStore();
  if (!scope) {
    return undefined;
  }

  scope.context = {...scope.context, ...LogContextSchema.partial().parse(fields)};
  return scope.context;
};
