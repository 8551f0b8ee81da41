/**
 * Log Sanitization Utility
 *
 * Removes sensitive information from log entries to prevent
 * accidental exposure of holder contact data and secrets.
 */

export interface SanitizationOptions {
  sensitiveKeys?: string[];
  redactedValue?: string;
  maxDepth?: number;
  preserveStructure?: boolean;
}

const DEFAULT_SENSITIVE_KEYS = ['phone', 'secret', 'password'];

const DEFAULT_OPTIONS: Required<SanitizationOptions> = {
  sensitiveKeys: DEFAULT_SENSITIVE_KEYS,
  redactedValue: '[REDACTED]',
  maxDepth: 10,
  preserveStructure: true,
};

function shouldSanitize(key: string, sensitiveKeys: string[]): boolean {
  const lowerKey = key.toLowerCase();
  return sensitiveKeys.some(sensitive =>
    lowerKey.includes(sensitive.toLowerCase())
  );
}

/**
 * Redact holder phone numbers embedded in free text
 */
export function sanitizeString(value: string): string {
  // International with a leading +, then plain 10-digit
  const intlPhonePattern = /\+\d[\d\s().-]{5,18}\d\b/g;
  const phonePattern = /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g;

  return value.replace(intlPhonePattern, '[PHONE]').replace(phonePattern, '[PHONE]');
}

/**
 * Recursively sanitize log metadata
 */
export function sanitizeLogData(
  data: unknown,
  options: SanitizationOptions = {},
  depth: number = 0
): unknown {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (depth > opts.maxDepth) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return sanitizeString(data);
  }

  if (typeof data !== 'object') {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item, opts, depth + 1));
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (Buffer.isBuffer(data)) {
    return `[Buffer ${data.length} bytes]`;
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: sanitizeString(data.message),
      stack: data.stack,
    };
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (shouldSanitize(key, opts.sensitiveKeys)) {
      if (opts.preserveStructure) {
        sanitized[key] = opts.redactedValue;
      }
      continue;
    }

    sanitized[key] = sanitizeLogData(value, opts, depth + 1);
  }

  return sanitized;
}

/**
 * Sanitize a metadata record, keeping the record shape
 */
export function sanitizeMetadata(
  meta: Record<string, unknown>,
  options: SanitizationOptions = {}
): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    if (shouldSanitize(key, opts.sensitiveKeys)) {
      if (opts.preserveStructure) {
        sanitized[key] = opts.redactedValue;
      }
      continue;
    }
    sanitized[key] = sanitizeLogData(value, opts, 1);
  }

  return sanitized;
}

/**
 * Mask sensitive parts of strings (show first and last few characters)
 */
export function maskSensitiveString(
  value: string,
  showFirst: number = 3,
  showLast: number = 3
): string {
  if (value.length <= showFirst + showLast) {
    return '[REDACTED]';
  }

  const first = value.slice(0, showFirst);
  const last = value.slice(-showLast);
  const masked = '*'.repeat(Math.max(value.length - showFirst - showLast, 3));

  return `${first}${masked}${last}`;
}
