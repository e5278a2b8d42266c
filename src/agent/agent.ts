/**
 * Tool-calling weather agent
 *
 * Round 1 asks the oracle with the weather tool available. A text reply is
 * returned as-is; a tool call is validated, executed against the weather proxy,
 * and round 2 asks the oracle to compose the answer from the normalized record.
 */

import { createAppError, isAppError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { getRequestId } from '../domain/request-context.js';
import type { Oracle, OracleMessage, OracleReply, OracleRequest } from './oracle.js';
import type { ProxyResult, WeatherProxy } from './proxy-client.js';
import {
  INVALID_LOOKUP_MESSAGE,
  INVALID_TOOL_CALL_MESSAGE,
  SYSTEM_PROMPT,
  WEATHER_UNAVAILABLE_MESSAGE,
  locationNotFoundMessage,
} from './prompts.js';
import { TOOL_LIST, parseToolCall } from './tools.js';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface AgentInput {
  query: string;
  history?: ChatMessage[];
}

export interface AgentDeps {
  oracle: Oracle;
  proxy: WeatherProxy;
}

export interface AgentReply {
  response: string;
  toolUsed: boolean;
}

export type AgentStatusEvent = { type: 'status'; message: string };

export type AgentEvent =
  | AgentStatusEvent
  | { type: 'result'; response: string; toolUsed: boolean }
  | { type: 'error'; message: string };

export const MODEL_UNAVAILABLE_MESSAGE =
  'The language model is currently unavailable. Please try again.';
export const EMPTY_REPLY_MESSAGE = 'The model returned an empty response. Please try again.';
export const UNEXPECTED_AGENT_MESSAGE = 'An unexpected error occurred.';

function toOracleMessage(turn: ChatMessage): OracleMessage {
  return turn.role === 'user'
    ? { role: 'user', content: turn.content }
    : { role: 'assistant', content: turn.content };
}

export function buildMessages(input: AgentInput): OracleMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    ...(input.history ?? []).map(toOracleMessage),
    { role: 'user', content: input.query },
  ];
}

async function askOracle(oracle: Oracle, request: OracleRequest, round: number): Promise<OracleReply> {
  try {
    return await oracle.complete(request);
  } catch (error) {
    logger.error('Oracle call failed', {
      requestId: getRequestId(),
      round,
      error: error instanceof Error ? error.message : String(error),
    });
    throw createAppError('UPSTREAM_ERROR', MODEL_UNAVAILABLE_MESSAGE, { round });
  }
}

function finalText(reply: OracleReply, round: number): string {
  if (reply.kind !== 'text') {
    logger.error('Oracle requested another tool call while composing the answer', {
      requestId: getRequestId(),
      round,
      toolName: reply.call.name,
    });
    throw createAppError('TOOL_CALL_ERROR', EMPTY_REPLY_MESSAGE, { round });
  }
  const text = reply.text.trim();
  if (!text) {
    logger.error('Oracle returned empty content', { requestId: getRequestId(), round });
    throw createAppError('UNEXPECTED_ERROR', EMPTY_REPLY_MESSAGE, { round });
  }
  return text;
}

function failureMessage(result: Extract<ProxyResult, { ok: false }>, location: string): string {
  switch (result.reason) {
    case 'not_found':
      return locationNotFoundMessage(location);
    case 'invalid_request':
      return INVALID_LOOKUP_MESSAGE;
    case 'unavailable':
      return WEATHER_UNAVAILABLE_MESSAGE;
  }
}

/**
 * The agent's steps; yields progress stages and returns the final reply.
 *
 * @throws AppError when the oracle fails or returns nothing usable
 */
async function* agentSteps(
  input: AgentInput,
  deps: AgentDeps
): AsyncGenerator<AgentStatusEvent, AgentReply, void> {
  const requestId = getRequestId();
  logger.info('Agent invoked', {
    requestId,
    query: input.query.slice(0, 80),
    historyTurns: input.history?.length ?? 0,
  });

  yield { type: 'status', message: 'Analyzing your question...' };

  const messages = buildMessages(input);
  const first = await askOracle(deps.oracle, { messages, tools: TOOL_LIST }, 1);

  if (first.kind === 'text') {
    const response = finalText(first, 1);
    logger.info('Agent reply', { requestId, toolUsed: false, reply: response.slice(0, 120) });
    return { response, toolUsed: false };
  }

  let location: string;
  try {
    ({ location } = parseToolCall(first.call));
  } catch (error) {
    if (isAppError(error)) {
      return { response: INVALID_TOOL_CALL_MESSAGE, toolUsed: false };
    }
    throw error;
  }

  yield { type: 'status', message: `Fetching weather data for ${location}...` };

  logger.info('Tool invocation', { requestId, toolName: first.call.name, location });
  const result = await deps.proxy.getCurrentWeather(location);

  if (!result.ok) {
    logger.warn('Weather lookup failed', {
      requestId,
      location,
      reason: result.reason,
      status: result.status,
    });
    return { response: failureMessage(result, location), toolUsed: true };
  }

  yield { type: 'status', message: 'Generating response...' };

  messages.push(
    { role: 'assistant', content: null, toolCalls: [first.call] },
    { role: 'tool', toolCallId: first.call.id, content: JSON.stringify(result.weather) }
  );

  const second = await askOracle(deps.oracle, { messages }, 2);
  const response = finalText(second, 2);

  logger.info('Agent reply', { requestId, toolUsed: true, reply: response.slice(0, 120) });
  return { response, toolUsed: true };
}

/**
 * Answer one query.
 *
 * @throws AppError UPSTREAM_ERROR when the oracle is unavailable, or another
 *   code when its output is unusable; the message is safe to show to a user
 */
export async function runAgent(input: AgentInput, deps: AgentDeps): Promise<AgentReply> {
  const steps = agentSteps(input, deps);
  let step = await steps.next();
  while (!step.done) {
    step = await steps.next();
  }
  return step.value;
}

/**
 * Answer one query as a stream of events: zero or more `status` events,
 * then exactly one `result` or `error`.
 */
export async function* runAgentStream(
  input: AgentInput,
  deps: AgentDeps
): AsyncGenerator<AgentEvent, void, void> {
  try {
    const reply = yield* agentSteps(input, deps);
    yield { type: 'result', response: reply.response, toolUsed: reply.toolUsed };
  } catch (error) {
    yield { type: 'error', message: userMessageFor(error) };
  }
}

/**
 * Short message for a failed run; unexpected detail goes to the log only
 */
export function userMessageFor(error: unknown): string {
  if (isAppError(error)) {
    return error.message;
  }
  if (error instanceof Error) {
    logger.logError(error, { requestId: getRequestId(), context: 'agent' });
  } else {
    logger.error('Agent failed with a non-Error value', {
      requestId: getRequestId(),
      error: String(error),
    });
  }
  return UNEXPECTED_AGENT_MESSAGE;
}
