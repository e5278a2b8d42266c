/**
 * Request Context Module
 * Provides automatic requestId propagation using AsyncLocalStorage
 * No need to thread requestId through function signatures
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export interface RequestContext {
  requestId: string;
  route?: string;
  toolName?: string;
  startTime?: number;
}

export const REQUEST_ID_HEADER = 'x-request-id';

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with request context
 * Automatically propagates context to all async operations
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current request context
 * Returns undefined if not running within a context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Express middleware: give every incoming request an id (reusing the caller's
 * x-request-id when it sends one) and run the rest of the chain inside its context
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(REQUEST_ID_HEADER);
  const requestId = incoming && incoming.length <= 128 ? incoming : generateRequestId();

  res.setHeader(REQUEST_ID_HEADER, requestId);
  runWithContext({ requestId, route: req.path, startTime: Date.now() }, () => next());
}
