/**
 * Log Sanitizer - Redacts sensitive data from log output
 */
import * as winston from 'winston';

// Sensitive keys to redact (case-insensitive)
const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization', 'apiKey', 'api_key', 'access_key', 'cookie'];

const REDACTED = '[REDACTED]';

const MAX_DEPTH = 10;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive.toLowerCase()));
}

/**
 * Recursively sanitize a value, redacting sensitive entries and token-looking strings.
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    // JWTs
    if (/^eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*$/.test(obj)) {
      return REDACTED;
    }
    // base64-ish blobs long enough to be credentials
    if (obj.length > 64 && /^[A-Za-z0-9+/=_-]+$/.test(obj)) {
      return REDACTED;
    }
    return obj;
  }

  // Only containers count against the depth limit
  if (typeof obj === 'object' && depth > MAX_DEPTH) {
    return '[MAX_DEPTH]';
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message };
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeObject(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}

/**
 * Winston format transformer that sanitizes every enumerable field of a log entry.
 */
export const sanitizeFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = isSensitiveKey(key) ? REDACTED : sanitizeObject(info[key], 1);
  }
  return info;
});
