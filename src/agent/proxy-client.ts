/**
 * HTTP client the agent uses to call the weather proxy
 */

import type { NormalizedWeather } from '../domain/types.js';
import { ErrorResponseSchema, NormalizedWeatherSchema } from '../domain/schemas/common.js';
import { logger } from '../domain/logger.js';
import { getRequestId, REQUEST_ID_HEADER } from '../domain/request-context.js';

export type ProxyFailureReason = 'not_found' | 'invalid_request' | 'unavailable';

export type ProxyResult =
  | { ok: true; weather: NormalizedWeather }
  | { ok: false; reason: ProxyFailureReason; status?: number; message: string };

/**
 * What the agent needs from the proxy; lets tests substitute a fake
 */
export interface WeatherProxy {
  getCurrentWeather(location: string): Promise<ProxyResult>;
}

export class WeatherProxyClient implements WeatherProxy {
  private readonly baseUrl: string;
  private readonly timeout: number;

  /**
   * @param baseUrl - Base URL of the weather proxy (e.g., http://localhost:8000)
   * @param timeout - Request timeout in milliseconds
   */
  constructor(baseUrl: string, timeout = 10000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.timeout = timeout;

    logger.info('WeatherProxyClient initialized', {
      baseUrl: this.baseUrl,
      timeout: this.timeout,
    });
  }

  /**
   * Fetch normalized weather. Never throws: every failure becomes a ProxyResult.
   */
  async getCurrentWeather(location: string): Promise<ProxyResult> {
    const requestId = getRequestId();
    const url = `${this.baseUrl}/weather?${new URLSearchParams({ location }).toString()}`;
    const startTime = Date.now();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          ...(requestId ? { [REQUEST_ID_HEADER]: requestId } : {}),
        },
        signal: controller.signal,
      });
      const body: unknown = await response.json().catch(() => undefined);
      const latency = Date.now() - startTime;

      logger.info('Weather proxy responded', {
        requestId,
        location,
        status: response.status,
        latency,
      });

      if (response.status === 200) {
        const weather = NormalizedWeatherSchema.safeParse(body);
        if (weather.success) {
          return { ok: true, weather: weather.data };
        }
        logger.error('Weather proxy returned an invalid body', { requestId, location });
        return {
          ok: false,
          reason: 'unavailable',
          status: response.status,
          message: 'Weather service returned an invalid response.',
        };
      }

      const errorBody = ErrorResponseSchema.safeParse(body);
      const message = errorBody.success ? errorBody.data.error : response.statusText;

      logger.error('Weather proxy error', {
        requestId,
        location,
        status: response.status,
        message,
      });

      return {
        ok: false,
        reason: reasonForStatus(response.status),
        status: response.status,
        message,
      };
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'AbortError';
      logger.error(timedOut ? 'Weather proxy timeout' : 'Weather proxy unreachable', {
        requestId,
        location,
        error: error instanceof Error ? error.message : String(error),
        latency: Date.now() - startTime,
      });
      return {
        ok: false,
        reason: 'unavailable',
        message: timedOut ? 'Weather service timed out.' : 'Weather service is unreachable.',
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function reasonForStatus(status: number): ProxyFailureReason {
  if (status === 404) {
    return 'not_found';
  }
  if (status === 400) {
    return 'invalid_request';
  }
  return 'unavailable';
}
