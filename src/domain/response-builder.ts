/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppError } from './types.js';

/**
 * Build a successful tool response with both structured content and a text summary
 */
export function buildToolResponse(
  structuredContent: Record<string, unknown>,
  textSummary: string
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent,
  };
}

/**
 * Build an error tool response.
 * Only the code and the caller-safe message are exposed; details stay in the logs.
 */
export function buildErrorResponse(error: AppError): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: `[${error.code}] ${error.message}`,
      },
    ],
    structuredContent: {
      error: {
        code: error.code,
        message: error.message,
      },
    },
    isError: true,
  };
}
