/**
 * Execution Context - Context propagation using AsyncLocalStorage
 *
 * Every inbound message is processed inside its own context so that the
 * transform and delivery logs of one message share a correlation id.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface ExecutionContext {
  correlationId: string;
  requestId: string;
  chatId?: string;
  destinationId?: string;
  startTime: number;
  environment: 'development' | 'production' | 'test';
  metadata?: Record<string, string>;
}

export const executionContext = new AsyncLocalStorage<ExecutionContext>();

/**
 * Get current execution context
 */
export function getContext(): ExecutionContext | undefined {
  return executionContext.getStore();
}

/**
 * Run function with execution context.
 * Fields missing from `context` are inherited from the enclosing context, if any.
 */
export function withContext<T>(context: Partial<ExecutionContext>, fn: () => T): T {
  const parent = getContext();
  const fullContext: ExecutionContext = {
    correlationId: context.correlationId ?? parent?.correlationId ?? randomUUID(),
    requestId: context.requestId ?? generateRequestId(),
    chatId: context.chatId ?? parent?.chatId,
    destinationId: context.destinationId ?? parent?.destinationId,
    startTime: context.startTime ?? parent?.startTime ?? Date.now(),
    environment: context.environment ?? parent?.environment ?? 'production',
    metadata: context.metadata ?? parent?.metadata,
  };

  return executionContext.run(fullContext, fn);
}

function generateRequestId(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).slice(2);
  return timestamp.toString() + '-' + random;
}

/**
 * Get correlation ID from current context
 */
export function getCorrelationId(): string | undefined {
  return getContext()?.correlationId;
}

/**
 * Get request ID from current context
 */
export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

/**
 * Get operation duration in milliseconds
 */
export function getOperationDuration(): number | undefined {
  const context = getContext();
  if (context) {
    return Date.now() - context.startTime;
  }
  return undefined;
}
