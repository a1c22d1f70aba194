// ═══════════════════════════════════════════════════════════════════════════════
// REDACTION — Strip Secrets and Free Text From Log Context
// ═══════════════════════════════════════════════════════════════════════════════

export interface RedactionOptions {
  /** Extra key fragments to redact (case-insensitive) */
  readonly extraKeys?: readonly string[];

  /** Maximum nesting depth before the value is replaced */
  readonly maxDepth?: number;
}

const SENSITIVE_KEY_FRAGMENTS = [
  'password',
  'secret',
  'token',
  'authorization',
  'redisurl',
];

// Note bodies are user-authored text; log their length, never their content.
const FREE_TEXT_KEYS = new Set(['text', 'notetext']);

function isSensitiveKey(key: string, extraKeys: readonly string[]): boolean {
  const lowerKey = key.toLowerCase();
  return [...SENSITIVE_KEY_FRAGMENTS, ...extraKeys].some(fragment =>
    lowerKey.includes(fragment.toLowerCase())
  );
}

/**
 * Return a copy of a log entry with sensitive values replaced.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  return redactRecord(entry, options, 0);
}

function redactRecord(
  record: object,
  options: RedactionOptions,
  depth: number
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    if (isSensitiveKey(key, options.extraKeys ?? [])) {
      result[key] = '[REDACTED]';
    } else if (FREE_TEXT_KEYS.has(key.toLowerCase()) && typeof inner === 'string') {
      result[key] = `[TEXT:${inner.length}]`;
    } else {
      result[key] = redactValue(inner, options, depth + 1);
    }
  }
  return result;
}

function redactValue(value: unknown, options: RedactionOptions, depth: number): unknown {
  const maxDepth = options.maxDepth ?? 6;
  if (depth > maxDepth) return '[MAX_DEPTH]';

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, options, depth + 1));
  }

  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return redactRecord(value, options, depth);
  }

  return value;
}
