/**
 * Common types for the weather proxy and agent
 */

/**
 * Error taxonomy shared by the proxy and the agent
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UPSTREAM_ERROR'
  | 'TOOL_CALL_ERROR'
  | 'UNEXPECTED_ERROR';

/**
 * Structured error object raised inside the services.
 * `details` is for logs only and never serialized to a caller.
 */
export interface AppError {
  code: ErrorCode;
  message: string;
  status: number;
  details?: {
    upstreamStatus?: number;
    providerCode?: number;
    requestId?: string;
    [key: string]: unknown;
  };
}

/**
 * JSON body of every error response
 */
export interface ErrorResponse {
  error: string;
}

/**
 * Fixed weather record returned by the proxy, whatever the provider's native format
 */
export interface NormalizedWeather {
  location: string;
  temperature: number;
  feels_like: number;
  humidity: number;
  wind_speed: number;
  wind_direction: string;
  weather_description: string;
  uv_index: number;
  visibility: number;
  cloud_cover: number;
}

export type WeatherUnits = 'm' | 'f' | 's';
