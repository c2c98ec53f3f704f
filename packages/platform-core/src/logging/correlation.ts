/**
 * Correlation Context
 *
 * Async correlation ID management across a unit of work (one batch call, one reset)
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { LogContext } from './types.js';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Run function with correlation context. Nested calls inherit the outer correlation id
 * unless the new context supplies its own.
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  const parent = correlationStorage.getStore();
  return correlationStorage.run({ ...parent, ...context }, fn);
}

export function generateCorrelationId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}
