/**
 * The single tool offered to the model, and validation of the model's calls to it
 */

import { z } from 'zod';
import type { ToolCallDirective, ToolSchema } from './oracle.js';
import { createAppError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { getRequestId } from '../domain/request-context.js';
import { LocationSchema } from '../domain/schemas/common.js';

export const WEATHER_TOOL_NAME = 'get_current_weather';

export const WEATHER_TOOL: ToolSchema = {
  type: 'function',
  function: {
    name: WEATHER_TOOL_NAME,
    description: 'Retrieves current weather for a location. Call for any weather-related query.',
    parameters: {
      type: 'object',
      properties: {
        location: { type: 'string', description: 'City or location name' },
      },
      required: ['location'],
    },
  },
};

export const TOOL_LIST: ToolSchema[] = [WEATHER_TOOL];

const WeatherToolArgsSchema = z.object({
  location: LocationSchema,
});

export type WeatherToolArgs = z.infer<typeof WeatherToolArgsSchema>;

/**
 * Validate a tool-call directive before acting on it.
 *
 * @throws AppError TOOL_CALL_ERROR for an unknown tool, arguments that are not a
 *   JSON object, or a missing or blank location
 */
export function parseToolCall(call: ToolCallDirective): WeatherToolArgs {
  const requestId = getRequestId();

  if (call.name !== WEATHER_TOOL_NAME) {
    logger.error('Oracle requested an unknown tool', { requestId, toolName: call.name });
    throw createAppError('TOOL_CALL_ERROR', `Unknown tool: ${call.name}`, { requestId });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(call.arguments);
  } catch (error) {
    logger.error('Malformed tool arguments', {
      requestId,
      arguments: call.arguments.slice(0, 200),
      error: error instanceof Error ? error.message : String(error),
    });
    throw createAppError('TOOL_CALL_ERROR', 'Tool arguments are not valid JSON', { requestId });
  }

  const parsed = WeatherToolArgsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error('Invalid tool arguments', {
      requestId,
      arguments: call.arguments.slice(0, 200),
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    throw createAppError('TOOL_CALL_ERROR', 'Tool arguments must include a non-empty location', {
      requestId,
    });
  }

  return parsed.data;
}
