/**
 * Stdio transport for the weather MCP server
 * Handles communication via standard input/output streams
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../domain/logger.js';
import type { AppConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';
import { createWeatherService } from './http.js';

/**
 * Start the MCP server with stdio transport
 */
export async function startStdioServer(config: AppConfig): Promise<McpServer> {
  const weather = config.weather;
  if (!weather) {
    throw new Error('Weather configuration is missing; APP_ROLE must be weather');
  }

  logger.info('Initializing MCP server with stdio transport');

  const server = createMcpServer(config, createWeatherService(weather));

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server connected via stdio transport', {
    capabilities: {
      tools: true,
    },
  });

  return server;
}
