/**
 * Unit tests for the oracle: completion parsing and the Azure OpenAI request
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ChatCompletion, ChatCompletionMessage } from 'openai/resources/chat/completions';

const { create, AzureOpenAI } = vi.hoisted(() => {
  const create = vi.fn();
  const AzureOpenAI = vi.fn(function () {
    return { chat: { completions: { create } } };
  });
  return { create, AzureOpenAI };
});

vi.mock('openai', () => ({ AzureOpenAI }));

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import { AzureOracle, ORACLE_TEMPERATURE, toOracleReply } from './oracle.js';
import { TOOL_LIST } from './tools.js';

function completion(message: Partial<ChatCompletionMessage>): ChatCompletion {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: message.tool_calls ? 'tool_calls' : 'stop',
        logprobs: null,
        message: { role: 'assistant', content: null, refusal: null, ...message },
      },
    ],
  };
}

const weatherCall = {
  id: 'call_1',
  type: 'function' as const,
  function: { name: 'get_current_weather', arguments: '{"location":"Austin"}' },
};

describe('toOracleReply', () => {
  it('should return text content', () => {
    expect(toOracleReply(completion({ content: 'Hello' }))).toEqual({
      kind: 'text',
      text: 'Hello',
    });
  });

  it('should return empty text for null content', () => {
    expect(toOracleReply(completion({ content: null }))).toEqual({ kind: 'text', text: '' });
  });

  it('should return the first tool call', () => {
    const second = { ...weatherCall, id: 'call_2' };
    expect(toOracleReply(completion({ tool_calls: [weatherCall, second] }))).toEqual({
      kind: 'tool_call',
      call: { id: 'call_1', name: 'get_current_weather', arguments: '{"location":"Austin"}' },
    });
  });

  it('should prefer a tool call over accompanying text', () => {
    const reply = toOracleReply(completion({ content: 'Let me check.', tool_calls: [weatherCall] }));
    expect(reply.kind).toBe('tool_call');
  });

  it('should throw when there is no choice', () => {
    expect(() => toOracleReply({ ...completion({}), choices: [] })).toThrow(
      'Chat completion contained no choices'
    );
  });
});

describe('AzureOracle', () => {
  const config = {
    endpoint: 'https://example-resource.openai.azure.com',
    apiKey: 'test-secret',
    deployment: 'gpt-4o-mini',
    apiVersion: '2025-01-01-preview',
    timeoutMs: 30000,
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should configure the client without retries', () => {
    new AzureOracle(config);

    expect(AzureOpenAI).toHaveBeenCalledWith({
      endpoint: 'https://example-resource.openai.azure.com',
      apiKey: 'test-secret',
      apiVersion: '2025-01-01-preview',
      deployment: 'gpt-4o-mini',
      timeout: 30000,
      maxRetries: 0,
    });
  });

  it('should send messages and tools with low temperature', async () => {
    create.mockResolvedValue(completion({ tool_calls: [weatherCall] }));
    const oracle = new AzureOracle(config);

    const reply = await oracle.complete({
      messages: [
        { role: 'system', content: 'You are a weather assistant.' },
        { role: 'user', content: 'Weather in Austin?' },
      ],
      tools: TOOL_LIST,
    });

    expect(reply.kind).toBe('tool_call');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: ORACLE_TEMPERATURE,
      messages: [
        { role: 'system', content: 'You are a weather assistant.' },
        { role: 'user', content: 'Weather in Austin?' },
      ],
      tools: [{ type: 'function', function: TOOL_LIST[0].function }],
    });
  });

  it('should map the tool exchange and omit tools when none are offered', async () => {
    create.mockResolvedValue(completion({ content: 'It is 72°F in Austin.' }));
    const oracle = new AzureOracle(config);

    const reply = await oracle.complete({
      messages: [
        { role: 'user', content: 'Weather in Austin?' },
        {
          role: 'assistant',
          content: null,
          toolCalls: [
            { id: 'call_1', name: 'get_current_weather', arguments: '{"location":"Austin"}' },
          ],
        },
        { role: 'tool', toolCallId: 'call_1', content: '{"temperature":72}' },
      ],
    });

    expect(reply).toEqual({ kind: 'text', text: 'It is 72°F in Austin.' });
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: ORACLE_TEMPERATURE,
      messages: [
        { role: 'user', content: 'Weather in Austin?' },
        { role: 'assistant', content: null, tool_calls: [weatherCall] },
        { role: 'tool', tool_call_id: 'call_1', content: '{"temperature":72}' },
      ],
    });
  });

  it('should propagate client failures', async () => {
    create.mockRejectedValue(new Error('Request timed out.'));
    const oracle = new AzureOracle(config);

    await expect(
      oracle.complete({ messages: [{ role: 'user', content: 'Weather in Austin?' }] })
    ).rejects.toThrow('Request timed out.');
  });
});
