/**
 * Job and Request Context
 *
 * Correlation id, document and layout of the work in progress, carried across
 * awaits with AsyncLocalStorage so log lines pick them up without explicit ids.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  sourceFilename?: string;
  /** Layout profile the document is read with */
  layoutVersion?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Correlation id of the current job or request; a fresh ulid outside of one
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId ?? ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export async function runWithContextAsync<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return storage.run(context, fn);
}
