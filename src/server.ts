/**
 * Shared MCP server factory
 * Used by both the stdio transport and the POST /mcp route of the HTTP transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './domain/logger.js';
import type { AppConfig } from './config/env.js';
import type { WeatherService } from './weather/service.js';
import { wrapTool } from './domain/tool-wrapper.js';
import {
  CURRENT_WEATHER_TOOL_NAME,
  CURRENT_WEATHER_TOOL_DESCRIPTION,
  CurrentWeatherInputShape,
  CurrentWeatherInputSchema,
  handleCurrentWeather,
} from './tools/current-weather.js';

/**
 * Create an MCP server exposing the weather lookup as a tool.
 * Returns the configured server (not yet connected to any transport).
 */
export function createMcpServer(
  config: Pick<AppConfig, 'serverName' | 'serverVersion'>,
  service: WeatherService
): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    CURRENT_WEATHER_TOOL_NAME,
    {
      description: CURRENT_WEATHER_TOOL_DESCRIPTION,
      inputSchema: CurrentWeatherInputShape,
    },
    wrapTool(CURRENT_WEATHER_TOOL_NAME, async (args: unknown) => {
      const input = CurrentWeatherInputSchema.parse(args);
      return handleCurrentWeather(input, service);
    })
  );

  logger.debug('Registered current weather tool');

  return server;
}
