/**
 * Model backend call types
 */

/**
 * Per-call options shared by text and structured generation
 */
export type GenerateOptions = {
  temperature?: number;
  maxTokens?: number;
  /** Aborts the in-flight request when the caller cancels the query. */
  signal?: AbortSignal;
};

export type EmbedOptions = {
  signal?: AbortSignal;
};

export type Embedding = number[];
