/**
 * Unit tests for the tool wrapper
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { wrapTool } from './tool-wrapper.js';
import { buildErrorResponse, buildToolResponse } from './response-builder.js';
import { createAppError } from './error-handler.js';
import { metrics } from './metrics.js';
import { getContext } from './request-context.js';

vi.mock('./logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    logError: vi.fn(),
    logToolStart: vi.fn(),
    logToolEnd: vi.fn(),
  },
}));

import { logger } from './logger.js';

describe('wrapTool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    metrics.reset();
  });

  it('should run the handler inside a request context', async () => {
    const wrapped = wrapTool('get_current_weather', async () => {
      const context = getContext();
      return buildToolResponse({ toolName: context?.toolName ?? null }, 'ok');
    });

    const result = await wrapped({ location: 'Austin' });

    expect(result.structuredContent).toEqual({ toolName: 'get_current_weather' });
    expect(logger.logToolStart).toHaveBeenCalledWith(
      'get_current_weather',
      { location: 'Austin' },
      expect.any(String)
    );
    expect(metrics.getMetrics().toolCalls).toEqual({ get_current_weather: { success: 1 } });
  });

  it('should log the error code of an error result', async () => {
    const wrapped = wrapTool('get_current_weather', async () =>
      buildErrorResponse(createAppError('NOT_FOUND', 'Location not found'))
    );

    await wrapped({ location: 'Atlantis' });

    expect(logger.logToolEnd).toHaveBeenCalledWith(
      'get_current_weather',
      expect.any(Number),
      'error',
      expect.any(String),
      'NOT_FOUND'
    );
    expect(metrics.getMetrics().toolCalls).toEqual({ get_current_weather: { error: 1 } });
  });

  it('should count and rethrow a handler that throws', async () => {
    const wrapped = wrapTool('get_current_weather', async () => {
      throw new Error('boom');
    });

    await expect(wrapped({ location: 'Austin' })).rejects.toThrow('boom');
    expect(logger.logToolEnd).toHaveBeenCalledWith(
      'get_current_weather',
      expect.any(Number),
      'error',
      expect.any(String),
      'UNEXPECTED_ERROR'
    );
    expect(metrics.getMetrics().toolCalls).toEqual({ get_current_weather: { error: 1 } });
  });
});
