import JSZip from 'jszip';
import { withXmlDeclaration } from '../lib/gpx-parser';
import { uniqueFilenames } from '../lib/filename';
import { logError } from '../lib/logger';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { errorResponse, methodNotAllowed } from './_response';

/**
 * GET ?operationId=: every track of an operation as one zip archive.
 */
export function createDownloadAllHandler(ctx: ApiContext) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    if (req.method !== 'GET') {
      return methodNotAllowed(corsHeaders);
    }

    const operationId = new URL(req.url).searchParams.get('operationId') || '';

    try {
      const operation = operationId ? await ctx.service.getOperation(operationId) : null;
      if (!operation?.tracks?.length) {
        return errorResponse('Track data not found. Please process the GPX file again.', 404, corsHeaders);
      }

      const zip = new JSZip();
      const filenames = uniqueFilenames(operation.tracks.map(t => t.name));
      operation.tracks.forEach((track, i) => {
        zip.file(filenames[i], withXmlDeclaration(track.content));
      });

      const archive = await zip.generateAsync({ type: 'arraybuffer' });

      return new Response(archive, {
        status: 200,
        headers: {
          ...corsHeaders,
          'Content-Type': 'application/zip',
          'Content-Disposition': 'attachment; filename="tracks.zip"',
        },
      });

    } catch (error) {
      logError('download-all:handler', error, { operationId });
      return errorResponse('Internal server error', 500, corsHeaders);
    }
  };
}

export default function handler(req: Request): Promise<Response> {
  return createDownloadAllHandler(getDefaultContext())(req);
}
