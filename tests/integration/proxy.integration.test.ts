/**
 * Integration tests against a running weather proxy backed by the live provider
 *
 * @group integration
 */

import { describe, it, expect } from 'vitest';
import { config, proxyClient } from './setup.js';

describe('Weather proxy integration', () => {
  it('should return a normalized record for a well-known city', async () => {
    const result = await proxyClient.getCurrentWeather('London');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.weather.location).toBe('London');
      expect(typeof result.weather.temperature).toBe('number');
      expect(Object.keys(result.weather).sort()).toEqual([
        'cloud_cover',
        'feels_like',
        'humidity',
        'location',
        'temperature',
        'uv_index',
        'visibility',
        'weather_description',
        'wind_direction',
        'wind_speed',
      ]);
    }
  });

  it('should report an unresolvable location as not found', async () => {
    const result = await proxyClient.getCurrentWeather('Qxzvbnmlkjh Nowhere 000');

    expect(result).toMatchObject({ ok: false, reason: 'not_found', status: 404 });
  });

  it('should reject a blank location', async () => {
    const response = await fetch(`${config.weatherProxyUrl}/weather?location=%20`);

    expect(response.status).toBe(400);
  });
});
