/**
 * Async-local context of the parse request being served. Log lines and
 * audit entries pick the request id up from here.
 */
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export type RequestSource = 'http' | 'cli';

export interface RequestContext {
  readonly requestId: string;
  readonly source: RequestSource;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/**
 * Fresh context for a parse that did not arrive with a request id
 */
export function createRequestContext(source: RequestSource, requestId: string = randomUUID()): RequestContext {
  return { requestId, source };
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
