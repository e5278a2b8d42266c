/**
 * Common Zod schemas shared by the proxy, the MCP tool and the agent
 */

import { z } from 'zod';

/**
 * Free-text location (city name), non-empty after trimming
 */
export const LocationSchema = z
  .string()
  .trim()
  .min(1, 'Location must not be empty')
  .describe('City or location name, e.g. "Austin" or "Paris, France"');

/**
 * Query string accepted by GET /weather. No other parameter is allowed.
 */
export const WeatherQuerySchema = z
  .object({
    location: LocationSchema,
  })
  .strict();

export type WeatherQuery = z.infer<typeof WeatherQuerySchema>;

/**
 * Normalized weather record (the proxy's response body)
 */
export const NormalizedWeatherSchema = z.object({
  location: z.string().describe('Resolved location name'),
  temperature: z.number().describe('Current temperature in the configured units'),
  feels_like: z.number().describe('Apparent temperature'),
  humidity: z.number().describe('Relative humidity in percent'),
  wind_speed: z.number().describe('Wind speed'),
  wind_direction: z.string().describe('Compass wind direction, e.g. "SSW"'),
  weather_description: z.string().describe('Short text description, e.g. "Partly cloudy"'),
  uv_index: z.number().describe('UV index'),
  visibility: z.number().describe('Visibility distance'),
  cloud_cover: z.number().describe('Cloud cover in percent'),
});

/**
 * Error body returned with 400, 404 and 502 responses
 */
export const ErrorResponseSchema = z.object({
  error: z.string(),
});
