/**
 * Similarity Search
 *
 * Picks the annotation that best describes an interaction.
 */

import { annotationEmbeddingText } from '@/core/graph-builder/embed-annotations';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { cosineSimilarity } from '@/providers/embedding/utils';
import type { Annotation } from '@/providers/graph/types';
import { callWithDeadline } from './deadline';

export interface AnnotationMatch {
  annotation: Annotation;
  score: number;
}

export interface SimilaritySearch {
  /**
   * Best candidate for the query text; null only when there are no candidates.
   */
  findBestMatch(queryText: string, candidates: readonly Annotation[]): Promise<AnnotationMatch | null>;
}

/**
 * Ranks candidates by cosine similarity between the query embedding and
 * each annotation's stored embedding. Candidates imported without an
 * embedding are embedded on the fly from the same text the import uses.
 */
export class EmbeddingSimilaritySearch implements SimilaritySearch {
  constructor(
    private readonly embeddingClient: EmbeddingClient,
    private readonly timeoutMs: number
  ) {}

  async findBestMatch(
    queryText: string,
    candidates: readonly Annotation[]
  ): Promise<AnnotationMatch | null> {
    if (candidates.length === 0) return null;

    const queryVector = await callWithDeadline('embedding', this.timeoutMs, (abortSignal) =>
      this.embeddingClient.embed(queryText, { abortSignal })
    );

    const missing = candidates.filter((annotation) => !annotation.embedding);
    const computed =
      missing.length > 0
        ? await callWithDeadline('embedding', this.timeoutMs, (abortSignal) =>
            this.embeddingClient.embedBatch(missing.map(annotationEmbeddingText), { abortSignal })
          )
        : [];
    const computedByGoId = new Map(missing.map((annotation, i) => [annotation.go_id, computed[i] ?? []]));

    let best: AnnotationMatch | null = null;
    for (const annotation of candidates) {
      const vector = annotation.embedding ?? computedByGoId.get(annotation.go_id) ?? [];
      const score = cosineSimilarity(queryVector, vector);
      // Ties keep the earlier candidate
      if (!best || score > best.score) {
        best = { annotation, score };
      }
    }
    return best;
  }
}
