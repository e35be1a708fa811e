// Key fragments that mark a value as credential material; matched against the key with separators stripped.
const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'nonce',
  'code_verifier',
  'codeverifier',
  'privatekey',
  'private_key',
  'key_pem'
];

// Exact keys only: `psk_id` and `psk_type` name a key without disclosing it.
const SENSITIVE_EXACT_KEYS = ['psk', 'psk_value', 'pre_shared_key'];

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const canonicalKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const createRedactor = (extraSensitiveKeys: string[]) => {
  const exactKeys = new Set(
    [...SENSITIVE_EXACT_KEYS, ...extraSensitiveKeys].map(canonicalKey).filter(key => key.length > 0)
  );
  const visited = new WeakSet<object>();

  const isSensitive = (key: string) => {
    const canonical = canonicalKey(key);
    return exactKeys.has(canonical) || SENSITIVE_KEY_FRAGMENTS.some(fragment => canonical.includes(fragment));
  };

  const redactRecord = (record: object, depth: number): Record<string, unknown> => {
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(record)) {
      output[key] = isSensitive(key) ? REDACTED : redact(entry, depth + 1);
    }
    return output;
  };

  const redact = (value: unknown, depth: number): unknown => {
    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'undefined':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
      default:
        break;
    }

    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }
    if (value instanceof Error) {
      return {name: value.name, message: value.message, ...(value.stack ? {stack: value.stack} : {})};
    }
    if (Array.isArray(value)) {
      return value.map(item => redact(item, depth + 1));
    }
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    return redactRecord(value, depth);
  };

  return {redact, redactRecord, visited};
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => createRedactor(extraSensitiveKeys).redact(value, 0);

export const sanitizeMetadataForLog = ({
  metadata,
  extraSensitiveKeys = []
}: {
  metadata: Record<string, unknown>;
  extraSensitiveKeys?: string[];
}): Record<string, unknown> => {
  const redactor = createRedactor(extraSensitiveKeys);
  redactor.visited.add(metadata);
  return redactor.redactRecord(metadata, 0);
};
