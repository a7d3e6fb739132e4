/**
 * Security Headers Configuration
 *
 * Pure values, no process.env access. Consumed by control-plane/api/http.ts.
 *
 * @module @config/headers
 */

/**
 * Baseline security headers applied to every HTTP response.
 * Does NOT include CSP or Permissions-Policy.
 */
export const BASE_SECURITY_HEADERS: Record<string, string> = {
  'X-Frame-Options': 'DENY',
  'X-Content-Type-Options': 'nosniff',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'X-XSS-Protection': '0',
  'X-DNS-Prefetch-Control': 'off',
  'Cross-Origin-Opener-Policy': 'same-origin',
  'Cross-Origin-Resource-Policy': 'same-origin',
};

/** Only sent in production, where the app sits behind TLS */
export const HSTS_HEADER = 'max-age=31536000; includeSubDomains';

export const PERMISSIONS_POLICY =
  'camera=(), microphone=(), geolocation=(), payment=(), usb=(), magnetometer=(), gyroscope=(), accelerometer=()';

/**
 * CSP for the server-rendered pages: same-origin scripts and styles only,
 * no inline script.
 */
export const CSP_WEB = [
  "default-src 'self'",
  "script-src 'self'",
  "style-src 'self'",
  "img-src 'self' data:",
  "connect-src 'self'",
  "object-src 'none'",
  "frame-ancestors 'none'",
  "base-uri 'self'",
  "form-action 'self'",
].join('; ');

/** CSP for JSON responses: nothing may load */
export const CSP_API = [
  "default-src 'none'",
  "frame-ancestors 'none'",
  "base-uri 'none'",
  "form-action 'none'",
].join('; ');
