import type { RetrievalError, RetrievalErrorKind, StageName } from '@/types/result';

export type ModelBackendErrorKind = 'backend_unavailable' | 'malformed_response' | 'timeout' | 'cancelled';

/** Raised by ModelBackend implementations; `kind` drives the stage's degraded path. */
export class ModelBackendError extends Error {
  constructor(
    readonly kind: ModelBackendErrorKind,
    message: string,
    readonly backend: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ModelBackendError';
  }
}

/** Raised by CatalogStore adapters when the graph cannot be queried. */
export class CatalogStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogStoreError';
  }
}

/** The caller aborted the query; partial results are discarded. */
export class QueryCancelledError extends Error {
  constructor(message = 'Query cancelled') {
    super(message);
    this.name = 'QueryCancelledError';
  }
}

function kindOf(err: unknown): RetrievalErrorKind {
  if (err instanceof ModelBackendError) return err.kind;
  if (err instanceof CatalogStoreError) return 'store_unavailable';
  if (err instanceof QueryCancelledError) return 'cancelled';
  if (err instanceof Error && err.name === 'AbortError') return 'cancelled';
  return 'backend_unavailable';
}

export function toRetrievalError(stage: StageName, err: unknown): RetrievalError {
  return {
    kind: kindOf(err),
    stage,
    message: err instanceof Error ? err.message : String(err),
  };
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new QueryCancelledError();
}
