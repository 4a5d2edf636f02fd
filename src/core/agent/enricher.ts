/**
 * Interaction Enricher
 *
 * Attaches to every edge of a downstream result the GO annotation of its
 * endpoint genes that best matches the interaction, so the answer can say
 * what the interaction does and not only that it exists.
 */

import {
  type Annotation,
  type GraphClient,
  INTERACTION_TYPES,
  isInteractionType
} from '@/providers/graph/types';
import { mapInBatches } from '@/utils/async';
import { callWithDeadline } from './deadline';
import type { SimilaritySearch } from './similarity-search';
import {
  type EdgeAnnotation,
  type EnrichedEdge,
  type GeneRef,
  type InteractionEdge,
  NO_ANNOTATION_MARKER
} from './types';

export interface EnricherOptions {
  /** Edges enriched at the same time */
  concurrency: number;
  graphTimeoutMs: number;
}

const NO_ANNOTATION: EdgeAnnotation = { status: 'no_annotation', marker: NO_ANNOTATION_MARKER };

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function displayNames(gene: GeneRef): string[] {
  return gene.names.length > 0 ? gene.names : gene.synonyms;
}

/**
 * Text the annotations are ranked against:
 * "<start names>, <subtypes>, <end names>, <type meaning>".
 */
export function interactionSearchText(edge: InteractionEdge): string {
  const meaning = isInteractionType(edge.type) ? INTERACTION_TYPES[edge.type] : edge.type;
  return [
    displayNames(edge.start).join(', '),
    edge.subtypes.join(', '),
    displayNames(edge.end).join(', '),
    meaning
  ].join(', ');
}

function edgeKey(edge: InteractionEdge): string {
  return [edge.start.id, edge.end.id, edge.type, edge.subtypes.join(',')].join('\u0000');
}

function uniqueByGoId(annotations: readonly Annotation[]): Annotation[] {
  const seen = new Map<string, Annotation>();
  for (const annotation of annotations) {
    if (!seen.has(annotation.go_id)) seen.set(annotation.go_id, annotation);
  }
  return [...seen.values()];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Enricher
// ═══════════════════════════════════════════════════════════════════════════════

export class InteractionEnricher {
  constructor(
    private readonly graphClient: GraphClient,
    private readonly search: SimilaritySearch,
    private readonly options: EnricherOptions
  ) {}

  /**
   * Enrich every edge of every path. The output has the same paths and
   * edges in the same order; each edge carries exactly one annotation
   * or the no-annotation marker.
   */
  async enrich(paths: readonly InteractionEdge[][]): Promise<EnrichedEdge[][]> {
    const geneIds = new Set<string>();
    for (const edge of paths.flat()) {
      geneIds.add(edge.start.id);
      geneIds.add(edge.end.id);
    }
    if (geneIds.size === 0) return paths.map(() => []);

    // One lookup for every endpoint of the result
    const annotationsByGene = await callWithDeadline('graph', this.options.graphTimeoutMs, () =>
      this.graphClient.getGeneAnnotations([...geneIds])
    );

    // Identical edges on different paths share one search
    const cache = new Map<string, Promise<EdgeAnnotation>>();
    const annotate = (edge: InteractionEdge): Promise<EdgeAnnotation> => {
      const key = edgeKey(edge);
      let pending = cache.get(key);
      if (!pending) {
        pending = this.annotateEdge(edge, annotationsByGene);
        cache.set(key, pending);
      }
      return pending;
    };

    const located = paths.flatMap((path, pathIndex) => path.map((edge) => ({ pathIndex, edge })));
    const annotated = await mapInBatches(located, this.options.concurrency, async ({ edge }) => ({
      ...edge,
      annotation: await annotate(edge)
    }));

    const enriched: EnrichedEdge[][] = paths.map(() => []);
    annotated.forEach((edge, i) => {
      const pathIndex = located[i]?.pathIndex;
      if (pathIndex !== undefined) enriched[pathIndex]?.push(edge);
    });
    return enriched;
  }

  private async annotateEdge(
    edge: InteractionEdge,
    annotationsByGene: Map<string, Annotation[]>
  ): Promise<EdgeAnnotation> {
    const candidates = uniqueByGoId([
      ...(annotationsByGene.get(edge.start.id) ?? []),
      ...(annotationsByGene.get(edge.end.id) ?? [])
    ]);
    if (candidates.length === 0) return NO_ANNOTATION;

    const match = await this.search.findBestMatch(interactionSearchText(edge), candidates);
    if (!match) return NO_ANNOTATION;

    const { annotation, score } = match;
    return {
      status: 'annotated',
      go_id: annotation.go_id,
      qualifiers: annotation.qualifiers,
      label: annotation.label,
      definition: annotation.definition,
      aspect: annotation.aspect,
      score
    };
  }
}
