/**
 * Configuration management for the weather proxy and agent
 * Loads and validates environment variables once, at process start
 */

import type { LogLevel } from '../domain/logger.js';
import type { WeatherUnits } from '../domain/types.js';

export type AppRole = 'weather' | 'agent' | 'all';
export type WeatherTransport = 'http' | 'stdio';

export interface WeatherConfig {
  weatherstackApiKey: string;
  weatherstackBaseUrl: string;
  weatherstackUnits: WeatherUnits;
  weatherstackTimeoutMs: number;
  port: number;
  transport: WeatherTransport;
}

export interface LlmConfig {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
}

export interface AgentConfig {
  port: number;
  weatherProxyUrl: string;
  weatherProxyTimeoutMs: number;
  llm: LlmConfig;
}

export interface AppConfig {
  role: AppRole;
  logLevel: LogLevel;
  serverName: string;
  serverVersion: string;
  /** Present when the role includes the weather proxy */
  weather?: WeatherConfig;
  /** Present when the role includes the agent */
  agent?: AgentConfig;
}

type Env = Record<string, string | undefined>;

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Invalid ${name}: ${value} (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return value;
}

function url(name: string, raw: string): string {
  try {
    new URL(raw);
  } catch {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return raw.replace(/\/$/, '');
}

function required(env: Env, name: string, hint: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} is required. ${hint}`);
  }
  return value;
}

function loadWeatherConfig(env: Env): WeatherConfig {
  return {
    weatherstackApiKey: required(
      env,
      'WEATHERSTACK_API_KEY',
      'Set it to the access key of your Weatherstack account.'
    ),
    weatherstackBaseUrl: url(
      'WEATHERSTACK_BASE_URL',
      env.WEATHERSTACK_BASE_URL || 'http://api.weatherstack.com'
    ),
    weatherstackUnits: oneOf('WEATHERSTACK_UNITS', env.WEATHERSTACK_UNITS || 'f', [
      'm',
      'f',
      's',
    ] as const),
    weatherstackTimeoutMs: positiveInt('WEATHERSTACK_TIMEOUT_MS', env.WEATHERSTACK_TIMEOUT_MS, 10000),
    port: positiveInt('WEATHER_PORT', env.WEATHER_PORT, 8000),
    transport: oneOf('WEATHER_TRANSPORT', env.WEATHER_TRANSPORT || 'http', [
      'http',
      'stdio',
    ] as const),
  };
}

function loadAgentConfig(env: Env): AgentConfig {
  const hint = 'The agent needs an Azure OpenAI deployment to answer questions.';
  return {
    port: positiveInt('AGENT_PORT', env.AGENT_PORT, 8001),
    weatherProxyUrl: url('WEATHER_PROXY_URL', env.WEATHER_PROXY_URL || 'http://localhost:8000'),
    weatherProxyTimeoutMs: positiveInt(
      'WEATHER_PROXY_TIMEOUT_MS',
      env.WEATHER_PROXY_TIMEOUT_MS,
      10000
    ),
    llm: {
      endpoint: url('AZURE_OPENAI_ENDPOINT', required(env, 'AZURE_OPENAI_ENDPOINT', hint)),
      apiKey: required(env, 'AZURE_OPENAI_API_KEY', hint),
      deployment: required(env, 'AZURE_OPENAI_DEPLOYMENT', hint),
      apiVersion: env.AZURE_OPENAI_API_VERSION || '2025-01-01-preview',
      timeoutMs: positiveInt('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS, 30000),
    },
  };
}

/**
 * Recursively freeze a configuration object
 */
function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const role = oneOf('APP_ROLE', env.APP_ROLE || 'all', ['weather', 'agent', 'all'] as const);
  const logLevel = oneOf('LOG_LEVEL', env.LOG_LEVEL || 'info', [
    'debug',
    'info',
    'warn',
    'error',
  ] as const);

  const config: AppConfig = {
    role,
    logLevel,
    serverName: 'weather-agent',
    serverVersion: '0.1.0',
    weather: role === 'agent' ? undefined : loadWeatherConfig(env),
    agent: role === 'weather' ? undefined : loadAgentConfig(env),
  };

  if (config.weather?.transport === 'stdio' && role === 'all') {
    throw new Error('WEATHER_TRANSPORT=stdio requires APP_ROLE=weather');
  }

  return deepFreeze(config);
}

let configInstance: Readonly<AppConfig> | null = null;

/**
 * Get the process configuration (loads on first call).
 * Only the entry point calls this; everything else receives the config explicitly.
 */
export function getConfig(): Readonly<AppConfig> {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
