import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import type { LogContext } from "@shared/logging";

const contextStorage = new AsyncLocalStorage<LogContext>();

const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQUEST_ID_LENGTH = 128;

/** Runs `callback` with a log context layered over the enclosing one. */
export function runWithRequestContext<T>(callback: () => T, initial: LogContext = {}): T {
  const parent = contextStorage.getStore();
  return contextStorage.run({ ...parent, ...initial }, callback);
}

export function getRequestContextStore(): LogContext | undefined {
  return contextStorage.getStore();
}

export function updateLogContext(patch: Partial<LogContext>): void {
  const store = contextStorage.getStore();
  if (!store) return;
  Object.assign(store, patch);
}

export function resolveRequestId(header: string | undefined): string {
  const candidate = header?.trim();
  if (candidate && candidate.length <= MAX_REQUEST_ID_LENGTH) {
    return candidate;
  }
  return randomUUID();
}

/**
 * Opens a context for the lifetime of the request so every log line written
 * while handling it carries the same request id.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER));
  res.setHeader("X-Request-Id", requestId);

  runWithRequestContext(next, {
    category: "http",
    requestId,
    method: req.method,
    path: req.path,
  });
}
