/**
 * Current Weather Tool
 * MCP counterpart of GET /weather: same validation, provider call and normalization
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { WeatherService } from '../weather/service.js';
import { summarizeWeather } from '../weather/normalize.js';
import { buildToolResponse, buildErrorResponse } from '../domain/response-builder.js';
import { createAppError, isAppError, UNEXPECTED_MESSAGE } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { LocationSchema } from '../domain/schemas/common.js';

export const CURRENT_WEATHER_TOOL_NAME = 'get_current_weather';

export const CURRENT_WEATHER_TOOL_DESCRIPTION =
  'Retrieves current weather for a location: temperature, feels-like, humidity, wind, ' +
  'description, UV index, visibility and cloud cover. Call for any weather-related query.';

/**
 * Tool input shape (registered with the MCP server as a raw Zod shape)
 */
export const CurrentWeatherInputShape = {
  location: LocationSchema,
};

export const CurrentWeatherInputSchema = z.object(CurrentWeatherInputShape);

export type CurrentWeatherInput = z.infer<typeof CurrentWeatherInputSchema>;

export async function handleCurrentWeather(
  input: CurrentWeatherInput,
  service: WeatherService
): Promise<CallToolResult> {
  try {
    const weather = await service.getCurrentWeather(input.location);
    return buildToolResponse({ ...weather }, summarizeWeather(weather));
  } catch (error) {
    if (isAppError(error)) {
      return buildErrorResponse(error);
    }

    logger.error('Current weather tool error', {
      error: error instanceof Error ? error.message : String(error),
      location: input.location,
    });

    return buildErrorResponse(createAppError('UNEXPECTED_ERROR', UNEXPECTED_MESSAGE));
  }
}
