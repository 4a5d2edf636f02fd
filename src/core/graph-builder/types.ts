/**
 * Graph Builder Types
 */

import type { AspectMap } from '@/config/schema';
import type { EmbeddingClient } from '@/providers/embedding/types';

export type { AspectMap };

// ═══════════════════════════════════════════════════════════════════════════════
// Sources
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One input document: a file name and its text.
 * The name identifies the source in reports and, for pathway maps,
 * supplies the map number when the document itself lacks one.
 */
export interface SourceDocument {
  name: string;
  content: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Skipped records
// ═══════════════════════════════════════════════════════════════════════════════

export const SKIP_REASONS = ['MissingIdentifier', 'ImportMalformedRecord', 'NonGeneRelation'] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface SkippedRecord {
  reason: SkipReason;
  source: string;
  detail: string;
}

export type SkipCounts = Record<SkipReason, number>;

// ═══════════════════════════════════════════════════════════════════════════════
// Build
// ═══════════════════════════════════════════════════════════════════════════════

export interface BuildOptions {
  /** When set, annotations without an embedding are embedded after the writes */
  embeddingClient?: EmbeddingClient;
  /** Texts per embedding request */
  embeddingBatchSize?: number;
}

export interface ImportReport {
  pathways: number;
  genes: number;
  diseases: number;
  annotations: number;
  interactions: number;
  associations: number;
  annotationLinks: number;
  /** Annotation rows naming no pathway gene */
  unmatchedAnnotations: number;
  skipped: SkipCounts;
  /** Store-side counters summed over every write; zero on an identical re-run */
  nodesCreated: number;
  relationshipsCreated: number;
  embeddedAnnotations: number;
  durationMs: number;
}
