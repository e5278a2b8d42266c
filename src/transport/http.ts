/**
 * HTTP transport for the weather proxy
 * GET /weather (normalized REST contract), /health, /metrics and POST /mcp
 */

import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import {
  createAppError,
  isAppError,
  isBodyParseError,
  toErrorResponse,
  UNEXPECTED_MESSAGE,
  VALIDATION_MESSAGE,
} from '../domain/error-handler.js';
import { getRequestId, requestContextMiddleware } from '../domain/request-context.js';
import { WeatherQuerySchema, type WeatherQuery } from '../domain/schemas/common.js';
import type { AppConfig, WeatherConfig } from '../config/env.js';
import type { AppError } from '../domain/types.js';
import { WeatherService } from '../weather/service.js';
import { WeatherstackClient } from '../weather/weatherstack-client.js';
import { createMcpServer } from '../server.js';

/**
 * Validate the /weather query string: exactly one non-blank `location`, nothing else
 */
export function parseWeatherQuery(query: unknown): WeatherQuery {
  const parsed = WeatherQuerySchema.safeParse(query);
  if (parsed.success) {
    return parsed.data;
  }

  const unknownKeys = parsed.error.issues.flatMap((issue) =>
    issue.code === 'unrecognized_keys' ? issue.keys : []
  );
  const message =
    unknownKeys.length > 0
      ? `Unknown query parameter(s): ${unknownKeys.join(', ')}. Only "location" is accepted.`
      : VALIDATION_MESSAGE;

  throw createAppError('VALIDATION_ERROR', message, { requestId: getRequestId() });
}

/**
 * Build the express app. The provider is injected through the service so that
 * tests can run the full HTTP contract without a network.
 */
export function createWeatherApp(
  config: Pick<AppConfig, 'serverName' | 'serverVersion'>,
  service: WeatherService
): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());
  // Must follow body parsing to keep the request context
  app.use(requestContextMiddleware);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http' });
  });

  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.exportPrometheus());
  });

  app.get('/weather', async (req, res) => {
    const requestId = getRequestId();
    logger.logRequest(req.method, req.path, req.query, requestId);

    try {
      const { location } = parseWeatherQuery(req.query);
      const weather = await service.getCurrentWeather(location);

      metrics.incrementRequest(200);
      logger.debug('Weather response sent', { requestId, status: 200 });
      res.status(200).json(weather);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      metrics.incrementRequest(status);

      if (isAppError(error)) {
        logger.info('Weather request failed', { requestId, status, code: error.code });
      } else if (error instanceof Error) {
        logger.logError(error, { requestId, context: 'GET /weather' });
      } else {
        logger.error('Unexpected non-Error thrown in GET /weather', {
          requestId,
          error: String(error),
        });
      }

      res.status(status).json(body);
    }
  });

  // MCP endpoint - stateless mode: a fresh server and transport per request so
  // JSON-RPC ids from different clients never collide
  app.post('/mcp', async (req, res) => {
    const server = createMcpServer(config, service);
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch((error: unknown) => {
          logger.warn('Error closing MCP transport', { error: String(error) });
        });
        server.close().catch((error: unknown) => {
          logger.warn('Error closing MCP server', { error: String(error) });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', {
        requestId: getRequestId(),
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // express.json() parse failures and anything else that escapes a route
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = getRequestId();
    if (isBodyParseError(error)) {
      logger.warn('Malformed request body', { requestId });
      res.status(400).json({ error: 'Malformed JSON body.' });
      return;
    }
    logger.error('Unhandled error in weather app', {
      requestId,
      error: error instanceof Error ? error.message : String(error),
    });
    const unexpected: AppError = createAppError('UNEXPECTED_ERROR', UNEXPECTED_MESSAGE);
    res.status(unexpected.status).json({ error: unexpected.message });
  });

  return app;
}

/**
 * Create the provider client and service from configuration
 */
export function createWeatherService(weather: WeatherConfig): WeatherService {
  const client = new WeatherstackClient({
    baseUrl: weather.weatherstackBaseUrl,
    accessKey: weather.weatherstackApiKey,
    units: weather.weatherstackUnits,
    timeout: weather.weatherstackTimeoutMs,
  });
  return new WeatherService(client);
}

/**
 * Start the weather proxy with HTTP transport
 */
export async function startHttpServer(config: AppConfig): Promise<Server> {
  const weather = config.weather;
  if (!weather) {
    throw new Error('Weather configuration is missing; APP_ROLE must be weather or all');
  }

  logger.info('Initializing weather proxy with HTTP transport', { port: weather.port });

  const app = createWeatherApp(config, createWeatherService(weather));

  return new Promise((resolve, reject) => {
    const server = app.listen(weather.port, () => {
      logger.info('Weather proxy listening on HTTP transport', {
        port: weather.port,
        weather: `http://localhost:${weather.port}/weather?location=<city>`,
        mcp: `http://localhost:${weather.port}/mcp`,
        health: `http://localhost:${weather.port}/health`,
        metrics: `http://localhost:${weather.port}/metrics`,
      });
      resolve(server);
    });
    server.on('error', (error) => {
      logger.error('HTTP server error', { error: error.message });
      reject(error);
    });
  });
}
