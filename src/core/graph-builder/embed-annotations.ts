/**
 * Annotation Embeddings
 *
 * Fills Annotation.embedding for terms written without one, so the
 * enricher can rank a gene's annotations against an interaction.
 */

import type { EmbeddingClient } from '@/providers/embedding/types';
import type { Annotation, GraphClient } from '@/providers/graph/types';

/**
 * Text embedded for an annotation. The enricher embeds candidates
 * missing a stored vector with the same text.
 */
export function annotationEmbeddingText(annotation: Annotation): string {
  return [
    `qualifiers: ${annotation.qualifiers.join(', ')}`,
    `label: ${annotation.label ?? ''}`,
    `definition: ${annotation.definition ?? ''}`,
    `aspect: ${annotation.aspect}`
  ].join('\n');
}

/**
 * Embed every annotation that has no embedding yet, `batchSize` at a time.
 * Returns the number of annotations embedded.
 */
export async function embedAnnotations(
  graphClient: GraphClient,
  embeddingClient: EmbeddingClient,
  batchSize: number
): Promise<number> {
  let embedded = 0;

  for (;;) {
    const pending = await graphClient.getAnnotationsWithoutEmbedding(batchSize);
    if (pending.length === 0) return embedded;

    const vectors = await embeddingClient.embedBatch(pending.map(annotationEmbeddingText));
    if (vectors.length !== pending.length) {
      throw new Error(`Expected ${pending.length} embeddings, received ${vectors.length}`);
    }

    await graphClient.setAnnotationEmbeddings(
      pending.map((annotation, i) => ({ goId: annotation.go_id, embedding: vectors[i] ?? [] }))
    );
    embedded += pending.length;
  }
}
