#!/usr/bin/env node
/**
 * Weather Agent
 * Entry point: starts the weather proxy, the agent, or both (APP_ROLE)
 */

import type { Server } from 'node:http';
import { getConfig } from './config/env.js';
import { logger } from './domain/logger.js';
import { startStdioServer } from './transport/stdio.js';
import { startHttpServer } from './transport/http.js';
import { startAgentServer } from './agent/http.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main() {
  try {
    const config = getConfig();

    logger.setLevel(config.logLevel);
    logger.registerSecret(config.weather?.weatherstackApiKey);
    logger.registerSecret(config.agent?.llm.apiKey);

    logger.info('Starting Weather Agent', {
      version: config.serverVersion,
      role: config.role,
      logLevel: config.logLevel,
    });

    const closers: Array<() => Promise<void>> = [];

    if (config.weather?.transport === 'stdio') {
      logger.info('Using stdio transport');
      const server = await startStdioServer(config);
      closers.push(() => server.close());
    } else if (config.weather) {
      logger.info('Using HTTP transport', { port: config.weather.port });
      const server = await startHttpServer(config);
      closers.push(() => closeServer(server));
    }

    if (config.agent) {
      const server = await startAgentServer(config.agent);
      closers.push(() => closeServer(server));
    }

    const shutdown = async () => {
      logger.info('Shutdown signal received, closing servers...');
      try {
        await Promise.all(closers.map((close) => close()));
        logger.info('Servers closed successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    process.on('uncaughtException', (error: Error) => {
      logger.logError(error, { context: 'uncaughtException' });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled promise rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
      });
      process.exit(1);
    });

    logger.info('Weather Agent is ready');
  } catch (error) {
    if (error instanceof Error) {
      logger.logError(error, { context: 'startup' });
    } else {
      logger.error('Unknown error during startup', { error: String(error) });
    }
    process.exit(1);
  }
}

void main();
