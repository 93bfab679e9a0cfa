/**
 * Shared CORS utility for API handlers.
 *
 * Allowed origins come from ServiceConfig (ALLOWED_ORIGINS, PRODUCTION_URL).
 * Outside production, localhost origins are always allowed.
 */

import type { ServiceConfig } from './_config';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:3000',
  'http://127.0.0.1:5173',
];

export function getCorsHeaders(
  req: Request,
  config: Pick<ServiceConfig, 'allowedOrigins' | 'production'>
): Record<string, string> {
  const origin = req.headers.get('origin') || '';

  const allowedOrigins = config.production
    ? config.allowedOrigins
    : [...config.allowedOrigins, ...DEV_ORIGINS];

  // Origin must be explicitly listed; an empty value sends no grant
  const allowOrigin = allowedOrigins.includes(origin) ? origin : '';

  return {
    'Access-Control-Allow-Origin': allowOrigin,
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Expose-Headers': 'Content-Disposition',
  };
}
