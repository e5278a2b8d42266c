/**
 * Tool Wrapper Utility
 * Wraps MCP tool handlers with request ids, start/end logging, metrics and timing
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { runWithContext, generateRequestId } from './request-context.js';
import { logger } from './logger.js';
import { metrics } from './metrics.js';

export type ToolHandler = (...args: unknown[]) => Promise<CallToolResult>;

/**
 * Wrap a tool handler with observability instrumentation
 */
export function wrapTool(toolName: string, handler: ToolHandler): ToolHandler {
  return async (...args: unknown[]): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    return runWithContext({ requestId, toolName, startTime }, async () => {
      try {
        logger.logToolStart(toolName, args[0], requestId);

        const result = await handler(...args);

        const latencyMs = Date.now() - startTime;
        const outcome: 'success' | 'error' = result.isError ? 'error' : 'success';
        const errorCode = result.isError ? extractErrorCode(result) : undefined;

        logger.logToolEnd(toolName, latencyMs, outcome, requestId, errorCode);
        metrics.incrementToolCall(toolName, outcome);
        metrics.recordLatency(toolName, latencyMs);

        return result;
      } catch (error) {
        // Handlers return error results; anything thrown here is unexpected
        const latencyMs = Date.now() - startTime;

        logger.logToolEnd(toolName, latencyMs, 'error', requestId, 'UNEXPECTED_ERROR');
        if (error instanceof Error) {
          logger.logError(error, { requestId, toolName, context: 'tool_wrapper' });
        } else {
          logger.error('Tool handler threw a non-Error value', {
            requestId,
            toolName,
            error: String(error),
          });
        }

        metrics.incrementToolCall(toolName, 'error');
        metrics.recordLatency(toolName, latencyMs);

        throw error;
      }
    });
  };
}

/**
 * Pull the "[CODE]" prefix that buildErrorResponse puts in the text content
 */
function extractErrorCode(result: CallToolResult): string | undefined {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    return undefined;
  }
  const match = first.text.match(/^\[(\w+)\]/);
  return match ? match[1] : undefined;
}
