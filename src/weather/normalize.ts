/**
 * Maps Weatherstack `current` payloads into the fixed NormalizedWeather record
 */

import type { AppError, NormalizedWeather } from '../domain/types.js';
import {
  createAppError,
  handleProviderError,
  UPSTREAM_MESSAGE,
} from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { WeatherstackCurrentSchema, WeatherstackErrorSchema } from './schemas.js';

/**
 * Normalize a provider body.
 *
 * @throws AppError NOT_FOUND for an unknown location, UPSTREAM_ERROR for any
 *   other provider error body or a payload that does not have the expected shape
 */
export function normalizeWeather(body: unknown, requestId?: string): NormalizedWeather {
  const providerError = WeatherstackErrorSchema.safeParse(body);
  if (providerError.success) {
    const { error } = providerError.data;
    throw handleProviderError(error?.code ?? 0, error?.type, requestId);
  }

  const parsed = WeatherstackCurrentSchema.safeParse(body);
  if (!parsed.success) {
    logger.error('Malformed payload from weather provider', {
      requestId,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    const error: AppError = createAppError('UPSTREAM_ERROR', UPSTREAM_MESSAGE, {
      requestId,
      reason: 'malformed_payload',
    });
    throw error;
  }

  const { location, current } = parsed.data;

  return Object.freeze({
    location: location.name,
    temperature: current.temperature,
    feels_like: current.feelslike,
    humidity: current.humidity,
    wind_speed: current.wind_speed,
    wind_direction: current.wind_dir,
    weather_description: current.weather_descriptions[0] ?? '',
    uv_index: current.uv_index,
    visibility: current.visibility,
    cloud_cover: current.cloudcover,
  });
}

/**
 * One-line human-readable summary, used as the MCP tool's text content
 */
export function summarizeWeather(weather: NormalizedWeather): string {
  const description = weather.weather_description || 'no description';
  return (
    `${weather.location}: ${weather.temperature}°, ${description}, ` +
    `feels like ${weather.feels_like}°, humidity ${weather.humidity}%, ` +
    `wind ${weather.wind_speed} (${weather.wind_direction || 'n/a'})`
  );
}
