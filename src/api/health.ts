import type { FetchLike } from '../lib/types';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { jsonResponse } from './_response';

const CHECK_TIMEOUT_MS = 5000;

/** Nominatim's status endpoint sits beside /reverse */
export function geocoderStatusUrl(nominatimUrl: string): string {
  return nominatimUrl.replace(/\/reverse\/?$/, '/status');
}

export function createHealthHandler(ctx: ApiContext, fetchImpl: FetchLike = globalThis.fetch.bind(globalThis)) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    const checks: Record<string, boolean> = {};
    const details: Record<string, string> = {};

    // Operation store read/write
    try {
      checks.store = await ctx.service.checkStore();
      if (!checks.store) {
        details.store = 'Read/write mismatch';
      }
    } catch (error) {
      checks.store = false;
      details.store = error instanceof Error ? error.message : 'Unknown error';
    }

    // Reverse geocoder
    try {
      const response = await fetchImpl(geocoderStatusUrl(ctx.config.nominatimUrl), {
        headers: { 'User-Agent': ctx.config.geocoderUserAgent },
        signal: AbortSignal.timeout(CHECK_TIMEOUT_MS),
      });
      checks.geocoder = response.ok;
      if (!response.ok) {
        details.geocoder = `HTTP ${response.status}`;
      }
    } catch (error) {
      checks.geocoder = false;
      details.geocoder = error instanceof Error ? error.message : 'Timeout or network error';
    }

    const allHealthy = Object.values(checks).every(v => v);
    // Splitting still works without place names
    const isDegraded = checks.store && !checks.geocoder;

    return jsonResponse({
      status: allHealthy ? 'healthy' : (isDegraded ? 'degraded' : 'unhealthy'),
      checks,
      details: Object.keys(details).length > 0 ? details : undefined,
      timestamp: new Date().toISOString(),
    }, allHealthy || isDegraded ? 200 : 503, corsHeaders);
  };
}

export default function handler(req: Request): Promise<Response> {
  return createHealthHandler(getDefaultContext())(req);
}
