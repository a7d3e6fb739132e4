/**
 * Shared Configuration Package
 *
 * @example
 * ```typescript
 * import { validateEnv, getConfig } from '@config';
 *
 * validateEnv();
 * const { PORT, HOST } = getConfig();
 * ```
 *
 * @module @config
 */

export { parseIntEnv } from './env';

export {
  type ValidationResult,
  validateConfig,
  validateEnv,
  loadConfig,
  getConfig,
  resetConfigCache,
} from './validation';

export { envSchema, type EnvConfig } from './schema';

export {
  BASE_SECURITY_HEADERS,
  HSTS_HEADER,
  PERMISSIONS_POLICY,
  CSP_WEB,
  CSP_API,
} from './headers';
