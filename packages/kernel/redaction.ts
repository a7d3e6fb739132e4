/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to log metadata before it is
 * written. Analyzer service credentials and database URLs travel through the
 * config and must never reach the log stream.
 */

const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^authorization$/i,
  /^cookie$/i,
  /^database[_-]?url$/i,
  /^connection[_-]?string$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^[a-zA-Z0-9_-]+\.eyJ/,           // JWT
  /^Bearer\s+[a-zA-Z0-9._-]+/,      // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,        // Basic auth
  /^postgres(ql)?:\/\/[^:]+:[^@]+@/, // connection string with credentials
];

export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(data: unknown, depth = 0, maxDepth = 10): SanitizedData {
  if (depth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, depth + 1, maxDepth));
  }

  if (typeof data === 'object') {
    const result: { [key: string]: SanitizedData } = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = isSensitiveField(key)
        ? '[REDACTED]'
        : sanitizeForLogging(value, depth + 1, maxDepth);
    }
    return result;
  }

  return String(data);
}
