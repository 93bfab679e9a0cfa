import type { ErrorResponse } from '../lib/types';

export function jsonResponse(
  body: unknown,
  status: number,
  corsHeaders: Record<string, string>
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...corsHeaders, 'Content-Type': 'application/json' },
  });
}

export function errorResponse(
  error: string,
  status: number,
  corsHeaders: Record<string, string>,
  extra: Pick<ErrorResponse, 'status'> = {}
): Response {
  const body: ErrorResponse = { success: false, error, ...extra };
  return jsonResponse(body, status, corsHeaders);
}

export function methodNotAllowed(corsHeaders: Record<string, string>): Response {
  return errorResponse('Method not allowed', 405, corsHeaders);
}
