/**
 * Unit tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './env.js';

const weatherEnv = {
  APP_ROLE: 'weather',
  WEATHERSTACK_API_KEY: 'test-secret',
};

const agentEnv = {
  APP_ROLE: 'agent',
  AZURE_OPENAI_ENDPOINT: 'https://example-resource.openai.azure.com/',
  AZURE_OPENAI_API_KEY: 'test-secret',
  AZURE_OPENAI_DEPLOYMENT: 'gpt-4o-mini',
};

describe('loadConfig', () => {
  it('should apply weather defaults', () => {
    const config = loadConfig(weatherEnv);

    expect(config.role).toBe('weather');
    expect(config.logLevel).toBe('info');
    expect(config.agent).toBeUndefined();
    expect(config.weather).toEqual({
      weatherstackApiKey: 'test-secret',
      weatherstackBaseUrl: 'http://api.weatherstack.com',
      weatherstackUnits: 'f',
      weatherstackTimeoutMs: 10000,
      port: 8000,
      transport: 'http',
    });
  });

  it('should apply agent defaults', () => {
    const config = loadConfig(agentEnv);

    expect(config.weather).toBeUndefined();
    expect(config.agent).toEqual({
      port: 8001,
      weatherProxyUrl: 'http://localhost:8000',
      weatherProxyTimeoutMs: 10000,
      llm: {
        endpoint: 'https://example-resource.openai.azure.com',
        apiKey: 'test-secret',
        deployment: 'gpt-4o-mini',
        apiVersion: '2025-01-01-preview',
        timeoutMs: 30000,
      },
    });
  });

  it('should load both parts for the default role', () => {
    const config = loadConfig({ ...weatherEnv, ...agentEnv, APP_ROLE: undefined });

    expect(config.role).toBe('all');
    expect(config.weather).toBeDefined();
    expect(config.agent).toBeDefined();
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...weatherEnv,
      WEATHERSTACK_BASE_URL: 'http://localhost:9999/',
      WEATHERSTACK_UNITS: 'm',
      WEATHERSTACK_TIMEOUT_MS: '2500',
      WEATHER_PORT: '9000',
      WEATHER_TRANSPORT: 'stdio',
      LOG_LEVEL: 'debug',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.weather).toMatchObject({
      weatherstackBaseUrl: 'http://localhost:9999',
      weatherstackUnits: 'm',
      weatherstackTimeoutMs: 2500,
      port: 9000,
      transport: 'stdio',
    });
  });

  it('should require the Weatherstack access key', () => {
    expect(() => loadConfig({ APP_ROLE: 'weather' })).toThrow('WEATHERSTACK_API_KEY is required');
  });

  it('should require the Azure OpenAI settings for the agent', () => {
    expect(() => loadConfig({ ...agentEnv, AZURE_OPENAI_DEPLOYMENT: '' })).toThrow(
      'AZURE_OPENAI_DEPLOYMENT is required'
    );
  });

  it.each([
    ['APP_ROLE', { ...weatherEnv, APP_ROLE: 'proxy' }, 'Invalid APP_ROLE: proxy'],
    ['LOG_LEVEL', { ...weatherEnv, LOG_LEVEL: 'verbose' }, 'Invalid LOG_LEVEL: verbose'],
    ['WEATHERSTACK_UNITS', { ...weatherEnv, WEATHERSTACK_UNITS: 'k' }, 'Invalid WEATHERSTACK_UNITS: k'],
    ['WEATHER_PORT', { ...weatherEnv, WEATHER_PORT: 'eighty' }, 'Invalid WEATHER_PORT: eighty'],
    ['WEATHERSTACK_TIMEOUT_MS', { ...weatherEnv, WEATHERSTACK_TIMEOUT_MS: '0' }, 'Invalid WEATHERSTACK_TIMEOUT_MS: 0'],
    ['WEATHERSTACK_BASE_URL', { ...weatherEnv, WEATHERSTACK_BASE_URL: 'not a url' }, 'Invalid WEATHERSTACK_BASE_URL: not a url'],
  ])('should reject an invalid %s', (_name, env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });

  it('should refuse stdio transport when the agent runs in the same process', () => {
    expect(() =>
      loadConfig({ ...weatherEnv, ...agentEnv, APP_ROLE: 'all', WEATHER_TRANSPORT: 'stdio' })
    ).toThrow('WEATHER_TRANSPORT=stdio requires APP_ROLE=weather');
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig(weatherEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weather)).toBe(true);
  });
});
