import type { RenameRequest, RenameResponse } from '../lib/types';
import { isClientError } from '../lib/errors';
import { logError } from '../lib/logger';
import { getCorsHeaders } from './_cors';
import { getDefaultContext, type ApiContext } from './_context';
import { errorResponse, jsonResponse, methodNotAllowed } from './_response';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Validate a rename body. Returns the request, or an error message.
 */
export function parseRenameRequest(body: unknown): RenameRequest | string {
  if (!isRecord(body)) {
    return 'Expected a JSON object';
  }

  const { operationId, trackIndex, newName } = body;
  if (operationId === undefined || trackIndex === undefined || newName === undefined) {
    return 'Missing operationId, trackIndex or newName';
  }
  if (typeof operationId !== 'string' || !operationId) {
    return 'Invalid operationId';
  }
  if (typeof trackIndex !== 'number' || !Number.isInteger(trackIndex) || trackIndex < 0) {
    return 'Invalid trackIndex';
  }
  if (typeof newName !== 'string' || !newName.trim()) {
    return 'Track name cannot be empty';
  }

  return {
    operationId,
    trackIndex,
    newName,
    startPlaceName: optionalString(body.startPlaceName),
    endPlaceName: optionalString(body.endPlaceName),
  };
}

/**
 * POST JSON { operationId, trackIndex, newName, startPlaceName?, endPlaceName? }
 */
export function createRenameHandler(ctx: ApiContext) {
  return async function handler(req: Request): Promise<Response> {
    const corsHeaders = getCorsHeaders(req, ctx.config);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    if (req.method !== 'POST') {
      return methodNotAllowed(corsHeaders);
    }

    let body: unknown;
    try {
      body = await req.json();
    } catch {
      return errorResponse('Invalid JSON body', 400, corsHeaders);
    }

    const request = parseRenameRequest(body);
    if (typeof request === 'string') {
      return errorResponse(request, 400, corsHeaders);
    }

    try {
      const operation = await ctx.service.getOperation(request.operationId);
      if (!operation?.tracks || request.trackIndex >= operation.tracks.length) {
        return errorResponse('Track not found', 404, corsHeaders);
      }

      const track = await ctx.service.renameTrack(operation, request.trackIndex, request);
      const response: RenameResponse = {
        success: true,
        message: `Track renamed to "${track.name}"`,
        track,
      };
      return jsonResponse(response, 200, corsHeaders);

    } catch (error) {
      if (isClientError(error)) {
        return errorResponse(error.message, 400, corsHeaders);
      }
      logError('rename:handler', error, { operationId: request.operationId });
      const message = error instanceof Error ? error.message : String(error);
      return errorResponse(`Error updating track name: ${message}`, 500, corsHeaders);
    }
  };
}

export default function handler(req: Request): Promise<Response> {
  return createRenameHandler(getDefaultContext())(req);
}
