/**
 * HTTP transport for the agent
 * POST /chat, POST /chat/stream (server-sent events), GET /health and the static frontend
 */

import type { Server } from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AgentConfig } from '../config/env.js';
import { isAppError, isBodyParseError, UNEXPECTED_MESSAGE } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { getRequestId, requestContextMiddleware } from '../domain/request-context.js';
import { runAgent, runAgentStream, userMessageFor, type AgentDeps, type AgentInput } from './agent.js';
import { AzureOracle } from './oracle.js';
import { WeatherProxyClient } from './proxy-client.js';

/**
 * Static frontend, found beside the package root from both src/ and dist/
 */
export const PUBLIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../public');

/** Most recent turns passed on to the oracle; older ones are dropped, not rejected */
export const MAX_HISTORY_TURNS = 50;

const ChatMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

/**
 * Body of POST /chat and POST /chat/stream
 */
export const ChatRequestSchema = z.object({
  query: z.string().trim().min(1).max(2000),
  history: z
    .array(ChatMessageSchema)
    .default([])
    .transform((turns) => turns.slice(-MAX_HISTORY_TURNS)),
});

const INVALID_BODY = { error: 'Invalid request body.' };

function parseChatRequest(body: unknown): AgentInput | undefined {
  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    logger.warn('Rejected chat request', {
      requestId: getRequestId(),
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return undefined;
  }
  return parsed.data;
}

/**
 * Oracle failures are upstream failures; everything else is ours
 */
function statusFor(error: unknown): number {
  return isAppError(error) && error.code === 'UPSTREAM_ERROR' ? 502 : 500;
}

export interface AgentAppOptions {
  model: string;
  proxyUrl: string;
  /** Directory served at / (defaults to PUBLIC_DIR) */
  publicDir?: string;
}

export function createAgentApp(options: AgentAppOptions, deps: AgentDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));
  // Must follow body parsing to keep the request context
  app.use(requestContextMiddleware);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', model: options.model, proxy_url: options.proxyUrl });
  });

  app.post('/chat', async (req, res) => {
    const input = parseChatRequest(req.body);
    if (!input) {
      res.status(400).json(INVALID_BODY);
      return;
    }

    logger.info('Incoming POST /chat', {
      requestId: getRequestId(),
      query: input.query.slice(0, 80),
      historyCount: input.history?.length ?? 0,
    });

    try {
      const reply = await runAgent(input, deps);
      res.status(200).json({ response: reply.response, tool_used: reply.toolUsed });
    } catch (error) {
      const status = statusFor(error);
      const message = userMessageFor(error);
      logger.error('Chat request failed', { requestId: getRequestId(), status, message });
      res.status(status).json({ error: message });
    }
  });

  app.post('/chat/stream', async (req, res) => {
    const input = parseChatRequest(req.body);
    if (!input) {
      res.status(400).json(INVALID_BODY);
      return;
    }

    logger.info('Incoming POST /chat/stream', {
      requestId: getRequestId(),
      query: input.query.slice(0, 80),
      historyCount: input.history?.length ?? 0,
    });

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    let closed = false;
    res.on('close', () => {
      closed = true;
    });

    // A disconnect takes effect at the next step: a call already in flight
    // finishes, and leaving the loop closes the generator before the next one
    for await (const event of runAgentStream(input, deps)) {
      if (closed) {
        logger.info('Client disconnected from chat stream', { requestId: getRequestId() });
        break;
      }
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    }
    res.end();
  });

  app.use(express.static(options.publicDir ?? PUBLIC_DIR));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json(INVALID_BODY);
      return;
    }
    logger.error('Unhandled error in agent app', {
      requestId: getRequestId(),
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: UNEXPECTED_MESSAGE });
  });

  return app;
}

/**
 * Start the agent with its real oracle and proxy client
 */
export async function startAgentServer(config: AgentConfig): Promise<Server> {
  const deps: AgentDeps = {
    oracle: new AzureOracle(config.llm),
    proxy: new WeatherProxyClient(config.weatherProxyUrl, config.weatherProxyTimeoutMs),
  };

  const app = createAgentApp(
    { model: config.llm.deployment, proxyUrl: config.weatherProxyUrl },
    deps
  );

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      logger.info('Agent listening', {
        port: config.port,
        chat: `http://localhost:${config.port}/chat`,
        frontend: `http://localhost:${config.port}/`,
      });
      resolve(server);
    });
    server.on('error', (error) => {
      logger.error('Agent HTTP server error', { error: error.message });
      reject(error);
    });
  });
}
