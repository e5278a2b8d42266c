/**
 * HTTP client for the Weatherstack `current` endpoint
 *
 * The access key is held here and nowhere else; it is sent only to the provider.
 */

import type { WeatherUnits } from '../domain/types.js';
import { handleHttpError, handleNetworkError, isAppError } from '../domain/error-handler.js';
import { logger, redactUrl } from '../domain/logger.js';
import { getRequestId, generateRequestId } from '../domain/request-context.js';

export interface WeatherstackClientOptions {
  /** Base URL without path (e.g., http://api.weatherstack.com) */
  baseUrl: string;
  accessKey: string;
  units: WeatherUnits;
  /** Request timeout in milliseconds */
  timeout: number;
}

/**
 * Anything able to fetch the raw provider body for a location.
 * WeatherService depends on this so tests can hand it a fake.
 */
export interface WeatherProvider {
  fetchCurrent(location: string): Promise<unknown>;
}

export class WeatherstackClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly accessKey: string;
  private readonly units: WeatherUnits;
  private readonly timeout: number;

  constructor(options: WeatherstackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.accessKey = options.accessKey;
    this.units = options.units;
    this.timeout = options.timeout;

    logger.info('WeatherstackClient initialized', {
      baseUrl: this.baseUrl,
      units: this.units,
      timeout: this.timeout,
    });
  }

  /**
   * Fetch current conditions for a location.
   *
   * Resolves with the parsed JSON body of any 2xx response, including
   * Weatherstack's `success: false` bodies, which the normalizer interprets.
   *
   * @throws AppError UPSTREAM_ERROR on non-2xx status, timeout, network failure or a non-JSON body
   */
  async fetchCurrent(location: string): Promise<unknown> {
    const requestId = getRequestId() ?? generateRequestId();
    const params = new URLSearchParams({
      access_key: this.accessKey,
      query: location,
      units: this.units,
    });
    const url = `${this.baseUrl}/current?${params.toString()}`;
    const startTime = Date.now();

    logger.debug('Provider request starting', {
      requestId,
      url: redactUrl(url),
      location,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      const latency = Date.now() - startTime;
      logger.logUpstreamCall(url, response.status, latency, requestId);

      if (!response.ok) {
        throw handleHttpError(response.status, response.statusText, requestId);
      }

      return await response.json();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }

      const latency = Date.now() - startTime;

      if (error instanceof Error) {
        logger.error('Provider request failed', {
          requestId,
          url: redactUrl(url),
          error: error.message,
          latency,
        });

        if (error.name === 'AbortError') {
          throw handleNetworkError(new Error(`Request timeout after ${this.timeout}ms`), requestId);
        }

        throw handleNetworkError(error, requestId);
      }

      logger.error('Provider request failed with unknown error', {
        requestId,
        url: redactUrl(url),
        error: String(error),
        latency,
      });

      throw handleNetworkError(new Error('Unknown error occurred'), requestId);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
