/**
 * Embedding Provider Types
 */

export interface EmbedOptions {
  /** Aborts the request when the caller's deadline passes */
  abortSignal?: AbortSignal;
}

/**
 * Embeds annotation text at import time and interaction text at question
 * time. Both sides must come from the same model for their vectors to be
 * comparable.
 */
export interface EmbeddingClient {
  /** Unit-length vector for one non-blank text */
  embed(text: string, options?: EmbedOptions): Promise<number[]>;

  /** Unit-length vectors in input order; one request for the whole batch */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

  /** embedding.dimensions from the config; every vector has this length */
  readonly dimensions: number;

  readonly modelId: string;
}
