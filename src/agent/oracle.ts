/**
 * LLM oracle: sends a conversation (and optionally tool schemas) to the model
 * and returns either a tool-call directive or a text reply
 */

import { AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type { LlmConfig } from '../config/env.js';
import { logger } from '../domain/logger.js';
import { getRequestId } from '../domain/request-context.js';

/**
 * Tool call as emitted by the model. Untrusted: `arguments` is raw JSON text.
 */
export interface ToolCallDirective {
  id: string;
  name: string;
  arguments: string;
}

export type OracleReply =
  | { kind: 'tool_call'; call: ToolCallDirective }
  | { kind: 'text'; text: string };

export type OracleMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCallDirective[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface OracleRequest {
  messages: OracleMessage[];
  tools?: ToolSchema[];
}

export interface Oracle {
  complete(request: OracleRequest): Promise<OracleReply>;
}

/** Low-randomness decoding for tool selection and answer composition */
export const ORACLE_TEMPERATURE = 0.2;

function toParam(message: OracleMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
      };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

/**
 * Turn a chat completion into the tagged reply. The first tool call wins.
 *
 * @throws Error when the completion carries no choice
 */
export function toOracleReply(completion: ChatCompletion): OracleReply {
  const choice = completion.choices[0];
  if (!choice) {
    throw new Error('Chat completion contained no choices');
  }

  const toolCall = choice.message.tool_calls?.[0];
  if (toolCall) {
    return {
      kind: 'tool_call',
      call: {
        id: toolCall.id,
        name: toolCall.function.name,
        arguments: toolCall.function.arguments,
      },
    };
  }

  return { kind: 'text', text: choice.message.content ?? '' };
}

/**
 * Oracle backed by an Azure OpenAI chat completions deployment.
 * Retries are disabled: a failed call is reported, not repeated.
 */
export class AzureOracle implements Oracle {
  private readonly client: AzureOpenAI;
  private readonly deployment: string;

  constructor(config: LlmConfig) {
    this.deployment = config.deployment;
    this.client = new AzureOpenAI({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
      deployment: config.deployment,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });

    logger.info('AzureOracle initialized', {
      endpoint: config.endpoint,
      deployment: config.deployment,
      apiVersion: config.apiVersion,
      timeoutMs: config.timeoutMs,
    });
  }

  async complete(request: OracleRequest): Promise<OracleReply> {
    const startTime = Date.now();
    const tools: ChatCompletionTool[] | undefined = request.tools?.map((tool) => ({
      type: 'function' as const,
      function: tool.function,
    }));

    const completion = await this.client.chat.completions.create({
      model: this.deployment,
      messages: request.messages.map(toParam),
      temperature: ORACLE_TEMPERATURE,
      ...(tools && tools.length > 0 ? { tools } : {}),
    });

    const reply = toOracleReply(completion);

    logger.debug('Oracle call completed', {
      requestId: getRequestId(),
      latencyMs: Date.now() - startTime,
      kind: reply.kind,
      finishReason: completion.choices[0]?.finish_reason,
    });

    return reply;
  }
}
