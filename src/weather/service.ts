/**
 * Weather service: validate, call the provider once, normalize.
 * Shared by the GET /weather route and the get_current_weather MCP tool.
 */

import type { NormalizedWeather } from '../domain/types.js';
import { createAppError, isAppError, VALIDATION_MESSAGE } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { getRequestId } from '../domain/request-context.js';
import { LocationSchema } from '../domain/schemas/common.js';
import type { WeatherProvider } from './weatherstack-client.js';
import { normalizeWeather } from './normalize.js';

export class WeatherService {
  constructor(private readonly provider: WeatherProvider) {}

  /**
   * Look up current conditions for a location.
   * No retries: a single provider failure is surfaced immediately.
   *
   * @throws AppError VALIDATION_ERROR (before any provider call), NOT_FOUND or UPSTREAM_ERROR
   */
  async getCurrentWeather(rawLocation: unknown): Promise<NormalizedWeather> {
    const requestId = getRequestId();
    const parsed = LocationSchema.safeParse(rawLocation);
    if (!parsed.success) {
      logger.warn('Rejected weather lookup with invalid location', { requestId });
      throw createAppError('VALIDATION_ERROR', VALIDATION_MESSAGE, { requestId });
    }

    const location = parsed.data;

    try {
      const body = await this.provider.fetchCurrent(location);
      const weather = normalizeWeather(body, requestId);
      metrics.incrementUpstreamCall('success');

      logger.debug('Weather lookup succeeded', {
        requestId,
        location,
        resolvedLocation: weather.location,
      });

      return weather;
    } catch (error) {
      if (isAppError(error)) {
        metrics.incrementUpstreamCall(error.code === 'NOT_FOUND' ? 'not_found' : 'error');
        logger.warn('Weather lookup failed', {
          requestId,
          location,
          code: error.code,
          upstreamStatus: error.details?.upstreamStatus,
          providerCode: error.details?.providerCode,
        });
      } else {
        metrics.incrementUpstreamCall('error');
      }
      throw error;
    }
  }
}
