import type { SplitMethod, SplitResponse } from '../lib/types';
import { isClientError } from '../lib/errors';
import { logError, logInfo } from '../lib/logger';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { errorResponse, jsonResponse, methodNotAllowed } from './_response';

const DEFAULT_MAX_DISTANCE_NM = 1.0;
const DEFAULT_MAX_TIME_HOURS = 1.0;

function readNumber(form: FormData, field: string, fallback: number): number | null {
  const value = form.get(field);
  if (value === null || (typeof value === 'string' && value.trim() === '')) {
    return fallback;
  }
  if (typeof value !== 'string') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

function readFlag(form: FormData, field: string): boolean {
  const value = form.get(field);
  return typeof value === 'string' && value.toLowerCase() === 'true';
}

/**
 * POST multipart form: gpx_file, split_method, max_distance_nm, max_time_hours,
 * require_timestamps, lookup_place_names.
 */
export function createSplitHandler(ctx: ApiContext) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    if (req.method !== 'POST') {
      return methodNotAllowed(corsHeaders);
    }

    const contentLength = Number(req.headers.get('content-length') || '0');
    if (contentLength > ctx.config.maxUploadBytes) {
      return errorResponse('File too large', 413, corsHeaders);
    }

    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      return errorResponse('Expected multipart form data', 400, corsHeaders);
    }

    const file = form.get('gpx_file');
    if (file === null || typeof file === 'string') {
      return errorResponse('No file uploaded', 400, corsHeaders);
    }
    if (file.name === '') {
      return errorResponse('No file selected', 400, corsHeaders);
    }
    if (file.size > ctx.config.maxUploadBytes) {
      return errorResponse('File too large', 413, corsHeaders);
    }

    const splitMethod: SplitMethod = form.get('split_method') === 'time' ? 'time' : 'tracks';
    const maxDistanceNm = readNumber(form, 'max_distance_nm', DEFAULT_MAX_DISTANCE_NM);
    const maxTimeHours = readNumber(form, 'max_time_hours', DEFAULT_MAX_TIME_HOURS);
    if (maxDistanceNm === null) {
      return errorResponse('Invalid max_distance_nm', 400, corsHeaders);
    }
    if (maxTimeHours === null) {
      return errorResponse('Invalid max_time_hours', 400, corsHeaders);
    }
    const requireTimestamps = readFlag(form, 'require_timestamps');
    const lookupPlaceNames = readFlag(form, 'lookup_place_names');

    logInfo('split', `Processing GPX file: ${file.name}`, {
      splitMethod,
      maxDistanceNm,
      maxTimeHours,
      requireTimestamps,
      lookupPlaceNames,
    });

    try {
      const operation = await ctx.service.start({
        gpxContent: await file.text(),
        splitMethod,
        maxDistanceNm,
        maxTimeHours,
        requireTimestamps,
        lookupPlaceNames,
      });

      const body: SplitResponse = {
        success: true,
        operationId: operation.id,
        totalTracks: operation.totalTracks,
        message: 'Processing started. Poll progress for updates.',
      };
      return jsonResponse(body, 200, corsHeaders);

    } catch (error) {
      if (isClientError(error)) {
        logInfo('split', `Rejected GPX file: ${error.message}`, { file: file.name });
        return errorResponse(error.message, 400, corsHeaders);
      }
      logError('split:handler', error, { file: file.name });
      const message = error instanceof Error ? error.message : String(error);
      return errorResponse(`Error processing GPX file: ${message}`, 500, corsHeaders);
    }
  };
}

export default function handler(req: Request): Promise<Response> {
  return createSplitHandler(getDefaultContext())(req);
}
