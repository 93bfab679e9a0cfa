/**
 * Service configuration, read from environment variables.
 *
 *   MAX_UPLOAD_MB            largest accepted GPX upload (default 100)
 *   OPERATION_TTL_SECONDS    how long split results stay available (default 3600)
 *   OPERATION_STORE          'memory' (default) or 'kv' for @vercel/kv
 *   NOMINATIM_URL            reverse geocoding endpoint
 *   GEOCODER_USER_AGENT      User-Agent sent to the geocoder (required by Nominatim)
 *   GEOCODE_INTERVAL_MS      minimum spacing between geocoder requests (default 1100)
 *   GEOCODE_TIMEOUT_MS       per-request geocoder timeout (default 5000)
 *   ALLOWED_ORIGINS          comma-separated CORS origins
 *   PRODUCTION_URL           extra allowed origin
 *
 * Unparseable numbers fall back to their defaults.
 */

export type StoreBackend = 'memory' | 'kv';

export interface ServiceConfig {
  maxUploadBytes: number;
  operationTtlSeconds: number;
  storeBackend: StoreBackend;
  nominatimUrl: string;
  geocoderUserAgent: string;
  geocodeIntervalMs: number;
  geocodeTimeoutMs: number;
  allowedOrigins: string[];
  production: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_NOMINATIM_URL = 'https://nominatim.openstreetmap.org/reverse';
const DEFAULT_USER_AGENT = 'GPX-Track-Splitter/1.0';

function positiveNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const allowedOrigins: string[] = [];

  if (env.ALLOWED_ORIGINS) {
    allowedOrigins.push(
      ...env.ALLOWED_ORIGINS.split(',').map(o => o.trim()).filter(Boolean)
    );
  }
  if (env.PRODUCTION_URL) {
    allowedOrigins.push(env.PRODUCTION_URL);
  }

  return {
    maxUploadBytes: positiveNumber(env.MAX_UPLOAD_MB, 100) * 1024 * 1024,
    operationTtlSeconds: positiveNumber(env.OPERATION_TTL_SECONDS, 3600),
    storeBackend: env.OPERATION_STORE === 'kv' ? 'kv' : 'memory',
    nominatimUrl: env.NOMINATIM_URL || DEFAULT_NOMINATIM_URL,
    geocoderUserAgent: env.GEOCODER_USER_AGENT || DEFAULT_USER_AGENT,
    geocodeIntervalMs: positiveNumber(env.GEOCODE_INTERVAL_MS, 1100),
    geocodeTimeoutMs: positiveNumber(env.GEOCODE_TIMEOUT_MS, 5000),
    allowedOrigins,
    production: env.NODE_ENV === 'production',
  };
}
