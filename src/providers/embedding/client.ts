/**
 * Vercel AI SDK Embedding Client
 *
 * Vectors are L2-normalized, so a dot product between two of them is their
 * cosine similarity, and checked against the configured dimensions before
 * they reach the store.
 */

import { type EmbeddingModel, embed, embedMany } from 'ai';
import type { EmbeddingClient, EmbedOptions } from './types';
import { normalizeL2 } from './utils';

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;

  constructor(
    private readonly model: EmbeddingModel,
    readonly dimensions: number
  ) {
    this.modelId = typeof model === 'string' ? model : model.modelId;
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    this.assertEmbeddable(text);
    const { embedding } = await embed({ model: this.model, value: text, abortSignal: options?.abortSignal });
    return this.toUnitVector(embedding);
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];
    texts.forEach((text) => this.assertEmbeddable(text));

    const { embeddings } = await embedMany({
      model: this.model,
      values: texts,
      abortSignal: options?.abortSignal
    });
    return embeddings.map((embedding) => this.toUnitVector(embedding));
  }

  private assertEmbeddable(text: string): void {
    if (!text.trim()) {
      throw new Error('Cannot embed empty or whitespace-only text');
    }
  }

  private toUnitVector(embedding: number[]): number[] {
    if (embedding.length !== this.dimensions) {
      throw new Error(
        `Model ${this.modelId} returned ${embedding.length} dimensions, expected ${this.dimensions}`
      );
    }
    return normalizeL2(embedding);
  }
}
