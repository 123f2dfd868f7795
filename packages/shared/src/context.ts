/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the company being processed across
 * worker jobs and API requests using Node.js AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  companyId?: number;
  companyName?: string;
  sourceType?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a context derived from the current one.
 * Fields in `overrides` replace the parent's; the correlation ID is kept
 * unless overridden.
 */
export async function runWithChildContextAsync<T>(
  overrides: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const child: RequestContext = {
    ...parent,
    ...overrides,
    correlationId: overrides.correlationId || parent?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(child, fn);
}

export { asyncLocalStorage };
