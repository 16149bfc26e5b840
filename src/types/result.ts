// Explicit per-stage outcomes: every pipeline stage returns a Result and the
// caller decides which degraded value to use on failure.

export type StageName = 'intent' | 'filters' | 'retrieval' | 'rerank' | 'answer' | 'collection';

export type RetrievalErrorKind =
  | 'backend_unavailable'
  | 'malformed_response'
  | 'timeout'
  | 'cancelled'
  | 'store_unavailable';

export interface RetrievalError {
  kind: RetrievalErrorKind;
  stage: StageName;
  message: string;
}

export type Result<T, E = RetrievalError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = RetrievalError>(error: E): Result<never, E> {
  return { ok: false, error };
}
