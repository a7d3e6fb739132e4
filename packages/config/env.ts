/**
 * Environment Variable Utilities
 *
 * Safe parsing of individual environment variables.
 */

/**
 * Parse integer environment variable with default.
 * Whitespace-only values and non-integers fall back to the default.
 */
export function parseIntEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}
