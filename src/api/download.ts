import { renameGpxTrack, withXmlDeclaration } from '../lib/gpx-parser';
import { sanitizeFilename } from '../lib/filename';
import { isClientError } from '../lib/errors';
import { logError, logInfo } from '../lib/logger';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { errorResponse, methodNotAllowed } from './_response';

export const GPX_CONTENT_TYPE = 'application/gpx+xml; charset=utf-8';

export function parseTrackIndex(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value)) return null;
  return Number(value);
}

/**
 * Header values must stay within Latin-1, so names outside printable ASCII
 * get an ASCII fallback plus an RFC 5987 filename* parameter.
 */
export function contentDisposition(filename: string): string {
  const asciiName = filename.replace(/[^\x20-\x7e]/g, '_');
  if (asciiName === filename) {
    return `attachment; filename="${filename}"`;
  }

  const encoded = encodeURIComponent(filename)
    .replace(/['()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
  return `attachment; filename="${asciiName}"; filename*=UTF-8''${encoded}`;
}

function gpxDownload(content: string, trackName: string, corsHeaders: Record<string, string>): Response {
  const filename = `${sanitizeFilename(trackName)}.gpx`;
  logInfo('download', `Downloading GPX file: ${filename}`, { trackName });

  return new Response(withXmlDeclaration(renameGpxTrack(content, trackName)), {
    status: 200,
    headers: {
      ...corsHeaders,
      'Content-Type': GPX_CONTENT_TYPE,
      'Content-Disposition': contentDisposition(filename),
    },
  });
}

async function downloadStored(req: Request, ctx: ApiContext, corsHeaders: Record<string, string>): Promise<Response> {
  const params = new URL(req.url).searchParams;
  const operationId = params.get('operationId') || '';

  const operation = operationId ? await ctx.service.getOperation(operationId) : null;
  if (!operation?.tracks?.length) {
    return errorResponse('Track data not found. Please process the GPX file again.', 404, corsHeaders);
  }

  const trackIndex = parseTrackIndex(params.get('trackIndex'));
  if (trackIndex === null || trackIndex >= operation.tracks.length) {
    return errorResponse('Invalid track index', 400, corsHeaders);
  }

  const track = operation.tracks[trackIndex];
  const trackName = params.get('trackName') || track.name;
  return gpxDownload(track.content, trackName, corsHeaders);
}

// Fallback when the operation has expired: the client posts the GPX it holds
async function downloadPosted(req: Request, corsHeaders: Record<string, string>): Promise<Response> {
  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    return errorResponse('Expected form data', 400, corsHeaders);
  }

  const content = form.get('gpx_content');
  if (typeof content !== 'string' || !content) {
    return errorResponse('No GPX content provided', 400, corsHeaders);
  }

  const trackName = form.get('track_name');
  return gpxDownload(content, typeof trackName === 'string' && trackName ? trackName : 'Track', corsHeaders);
}

/**
 * GET ?operationId=&trackIndex=&trackName= serves a stored track;
 * POST form (gpx_content, track_name) renames and serves posted GPX.
 */
export function createDownloadHandler(ctx: ApiContext) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    try {
      if (req.method === 'GET') {
        return await downloadStored(req, ctx, corsHeaders);
      }
      if (req.method === 'POST') {
        return await downloadPosted(req, corsHeaders);
      }
      return methodNotAllowed(corsHeaders);

    } catch (error) {
      if (isClientError(error)) {
        return errorResponse(error.message, 400, corsHeaders);
      }
      logError('download:handler', error);
      const message = error instanceof Error ? error.message : String(error);
      return errorResponse(`Error serving GPX download: ${message}`, 500, corsHeaders);
    }
  };
}

export default function handler(req: Request): Promise<Response> {
  return createDownloadHandler(getDefaultContext())(req);
}
