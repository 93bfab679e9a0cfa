import { logError } from '../lib/logger';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { errorResponse, jsonResponse, methodNotAllowed } from './_response';

/**
 * GET ?operationId=: progress of place-name lookups, with results once complete.
 */
export function createProgressHandler(ctx: ApiContext) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    if (req.method !== 'GET') {
      return methodNotAllowed(corsHeaders);
    }

    const operationId = new URL(req.url).searchParams.get('operationId');
    if (!operationId) {
      return errorResponse('Missing operationId', 400, corsHeaders);
    }

    try {
      const progress = await ctx.service.progress(operationId);
      if (!progress) {
        return errorResponse('Operation not found', 404, corsHeaders, { status: 'not_found' });
      }
      return jsonResponse(progress, 200, corsHeaders);

    } catch (error) {
      logError('progress:handler', error, { operationId });
      return errorResponse('Internal server error', 500, corsHeaders);
    }
  };
}

export default function handler(req: Request): Promise<Response> {
  return createProgressHandler(getDefaultContext())(req);
}
