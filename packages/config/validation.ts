/**
 * Configuration Validation
 *
 * Parses the environment once at startup. A bad value stops the process
 * before it binds a port.
 */

import { getLogger } from '@kernel/logger';

import { envSchema, type EnvConfig } from './schema';

const logger = getLogger('ConfigValidation');

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

let cachedConfig: EnvConfig | undefined;

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate an environment object without throwing
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: formatIssues(result.error.issues) };
}

/**
 * Parse and cache the configuration.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment configuration:\n  ${formatIssues(result.error.issues).join('\n  ')}`);
  }
  cachedConfig = result.data;
  return result.data;
}

/**
 * Cached configuration, parsed from process.env on first use
 */
export function getConfig(): EnvConfig {
  return cachedConfig ?? loadConfig();
}

/**
 * Startup validation: throws on invalid config, warns on degraded setups
 */
export function validateEnv(): EnvConfig {
  const config = loadConfig();
  if (!config.ANALYZER_SERVICE_URL) {
    logger.warn('ANALYZER_SERVICE_URL is not set; every analysis request will fail with 503');
  }
  return config;
}

/**
 * Drop the cached configuration. Used by tests that change process.env.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
