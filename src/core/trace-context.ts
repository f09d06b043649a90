/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context. Each job fire and each re-planning pass
 * runs inside its own context, so every log line it produces carries the same
 * traceId.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID - the job id or the pass id */
  traceId: string;
  /** What started the trace (e.g. "hourly", "startup") */
  correlationId?: string;
  /** Current span ID for this operation */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context (if any).
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Create a trace context rooted at the given id.
 */
export function createTraceContext(
  id: string,
  options: { correlationId?: string; spanId?: string } = {}
): TraceContext {
  const context: TraceContext = { traceId: id };
  if (options.correlationId !== undefined) {
    context.correlationId = options.correlationId;
  }
  context.spanId = options.spanId ?? `span_${randomUUID().slice(0, 8)}`;
  return context;
}
