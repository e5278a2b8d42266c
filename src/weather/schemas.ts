/**
 * Zod schemas for the Weatherstack `current` endpoint
 * See: https://weatherstack.com/documentation
 */

import { z } from 'zod';

const numberOrZero = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

const stringOrEmpty = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/**
 * Weatherstack signals failures with HTTP 200 and this body
 */
export const WeatherstackErrorSchema = z.object({
  success: z.literal(false),
  error: z
    .object({
      code: z.number(),
      type: z.string().optional(),
      info: z.string().optional(),
    })
    .optional(),
});

export type WeatherstackError = z.infer<typeof WeatherstackErrorSchema>;

export const WeatherstackCurrentSchema = z.object({
  location: z.object({
    name: stringOrEmpty,
    country: stringOrEmpty,
    region: stringOrEmpty,
  }),
  current: z.object({
    temperature: numberOrZero,
    feelslike: numberOrZero,
    humidity: numberOrZero,
    wind_speed: numberOrZero,
    wind_dir: stringOrEmpty,
    weather_descriptions: z
      .array(z.string())
      .nullish()
      .transform((value) => value ?? []),
    uv_index: numberOrZero,
    visibility: numberOrZero,
    cloudcover: numberOrZero,
  }),
});

export type WeatherstackCurrent = z.infer<typeof WeatherstackCurrentSchema>;
