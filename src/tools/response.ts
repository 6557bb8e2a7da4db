/**
 * Tool response helpers
 */

import { ServiceError, toError } from '../errors/index.js';
import type { ToolCallResponse } from '../types/tools.js';

export function jsonResponse(payload: unknown): ToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorResponse(error: string, details: Record<string, unknown> = {}): ToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error, ...details }, null, 2) }],
    isError: true,
  };
}

/**
 * Error response for a failed tool call, carrying the error code and context of service errors
 */
export function failureResponse(action: string, error: unknown): ToolCallResponse {
  if (error instanceof ServiceError) {
    return errorResponse(`Failed to ${action}`, {
      name: error.name,
      code: error.code,
      severity: error.severity,
      message: error.message,
      context: error.context,
    });
  }
  return errorResponse(`Failed to ${action}`, { message: toError(error).message });
}
