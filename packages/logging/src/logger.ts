import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@ovpn-portal/schemas';
import {z} from 'zod';

import {getLogContext} from './context';
import {sanitizeMetadataForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EventLevel = LogEvent['level'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: Number.POSITIVE_INFINITY
};

// Caller-supplied part of an event; identity fields come from the logger, identifiers default from the request scope.
export const LogEventInputSchema = LogEventSchema.omit({ts: true, service: true, env: true}).extend({
  correlation_id: LogEventSchema.shape.correlation_id.max(128).optional(),
  request_id: LogEventSchema.shape.request_id.max(128).optional(),
  metadata: LogEventSchema.shape.metadata.optional()
});

export type LogEventInput = z.infer<typeof LogEventInputSchema>;
type LevelledInput = Omit<LogEventInput, 'level'>;

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
} & Record<EventLevel, (input: LevelledInput) => void>;

const CONTEXT_FIELDS = ['subject', 'route', 'method'] as const;

const withContext = (input: LogEventInput) => {
  const context = getLogContext();
  const inherited: Partial<Pick<LogEvent, (typeof CONTEXT_FIELDS)[number]>> = {};
  for (const field of CONTEXT_FIELDS) {
    const value = input[field] ?? context?.[field];
    if (value) {
      inherited[field] = value;
    }
  }

  return {
    ...input,
    ...inherited,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a'
  };
};

export const createStructuredLogger = ({
  service,
  env,
  level,
  now = () => new Date(),
  writer = {stdout: process.stdout, stderr: process.stderr},
  extraSensitiveKeys = []
}: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_RANK[LogLevelSchema.parse(level)];
  const identity = {
    service: z.string().min(1).parse(service),
    env: z.string().min(1).parse(env)
  };

  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (LEVEL_RANK[input.level] < threshold) {
        return;
      }

      const line = LogEventSchema.parse({
        ts: now().toISOString(),
        ...identity,
        ...withContext(input),
        metadata: sanitizeMetadataForLog({metadata: input.metadata ?? {}, extraSensitiveKeys})
      });
      const stream = input.level === 'error' || input.level === 'fatal' ? writer.stderr : writer.stdout;
      stream.write(`${JSON.stringify(line)}\n`);
    } catch {
      // a broken sink or malformed event is dropped
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

const ignore = () => undefined;

export const createNoopLogger = (): StructuredLogger => ({
  log: ignore,
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
  fatal: ignore
});
