/**
 * Unit tests for response-builder
 */

import { describe, it, expect } from 'vitest';
import { buildToolResponse, buildErrorResponse } from './response-builder.js';
import { createAppError } from './error-handler.js';

describe('buildToolResponse', () => {
  it('should include both text and structured content', () => {
    const result = buildToolResponse({ location: 'Austin', temperature: 72 }, 'Austin: 72°');

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Austin: 72°' }],
      structuredContent: { location: 'Austin', temperature: 72 },
    });
    expect(result.isError).toBeUndefined();
  });
});

describe('buildErrorResponse', () => {
  it('should expose code and message but not details', () => {
    const error = createAppError('UPSTREAM_ERROR', 'Upstream weather service unavailable', {
      upstreamStatus: 500,
      networkError: 'socket hang up',
    });

    expect(buildErrorResponse(error)).toEqual({
      content: [{ type: 'text', text: '[UPSTREAM_ERROR] Upstream weather service unavailable' }],
      structuredContent: {
        error: { code: 'UPSTREAM_ERROR', message: 'Upstream weather service unavailable' },
      },
      isError: true,
    });
  });
});
