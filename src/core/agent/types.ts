/**
 * Agent Types
 */

import type { JSONValue } from '@ai-sdk/provider';
import { z } from 'zod';
import type { EmbeddingClient } from '@/providers/embedding/types';
import type { Aspect, GraphClient, QueryRow } from '@/providers/graph/types';
import type { LLMClient } from '@/providers/llm/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Categories
// ═══════════════════════════════════════════════════════════════════════════════

export const CATEGORIES = ['disease_association', 'downstream_interaction'] as const;

export type Category = (typeof CATEGORIES)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// Dependencies and Settings
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-operation model settings, applied on every completion of that operation.
 */
export interface LLMCallSettings {
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  options?: Record<string, JSONValue>;
  /** Deadline for one completion */
  timeoutMs: number;
}

export interface AgentDependencies {
  graphClient: GraphClient;
  embeddingClient: EmbeddingClient;
  /** One client per operation; they may share a model */
  llm: {
    classification: LLMClient;
    query: LLMClient;
    answer: LLMClient;
  };
}

export interface AgentSettings {
  /** Corrections allowed after the first failed attempt */
  retryBudget: number;
  /** Edges enriched concurrently */
  enrichmentConcurrency: number;
  /** Schema description embedded in query prompts */
  schema: string;
  graphTimeoutMs: number;
  searchTimeoutMs: number;
  classification: LLMCallSettings;
  query: LLMCallSettings;
  answer: LLMCallSettings;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Executor
// ═══════════════════════════════════════════════════════════════════════════════

export type ExecutorState = 'Ready' | 'Executing' | 'Retrying' | 'Succeeded' | 'Failed';

export interface AttemptRecord {
  /** 1-based */
  attempt: number;
  query: string;
  error: { kind: string; message: string } | null;
}

export interface ExecutionOutcome {
  rows: QueryRow[];
  /** The query that produced `rows` */
  query: string;
  attempts: AttemptRecord[];
  trace: ExecutorState[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Interaction Results
// ═══════════════════════════════════════════════════════════════════════════════

const GeneRefSchema = z.object({
  id: z.string(),
  names: z.array(z.string()).default([]),
  synonyms: z.array(z.string()).default([])
});

export const InteractionEdgeSchema = z.object({
  start: GeneRefSchema,
  end: GeneRefSchema,
  type: z.string(),
  subtypes: z
    .array(z.string())
    .nullish()
    .transform((subtypes) => subtypes ?? [])
});

/** The `interactions` column: one list of edges per path */
export const InteractionsSchema = z.array(z.array(InteractionEdgeSchema));

export type GeneRef = z.infer<typeof GeneRefSchema>;
export type InteractionEdge = z.infer<typeof InteractionEdgeSchema>;

export const NO_ANNOTATION_MARKER = 'no annotation available';

/** Exactly one of the two per enriched edge */
export type EdgeAnnotation =
  | {
      status: 'annotated';
      go_id: string;
      qualifiers: string[];
      label: string | null;
      definition: string | null;
      aspect: Aspect;
      score: number;
    }
  | { status: 'no_annotation'; marker: typeof NO_ANNOTATION_MARKER };

export interface EnrichedEdge extends InteractionEdge {
  annotation: EdgeAnnotation;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Facts and Answers
// ═══════════════════════════════════════════════════════════════════════════════

export type Facts =
  | { kind: 'empty' }
  | { kind: 'disease_association'; rows: QueryRow[] }
  | { kind: 'downstream_interaction'; paths: EnrichedEdge[][] };

export const FAILURE_TYPES = [
  'ClassificationAmbiguous',
  'RetryBudgetExhausted',
  'UpstreamServiceTimeout',
  'QuerySynthesis',
  'Unexpected'
] as const;

export type FailureType = (typeof FAILURE_TYPES)[number];

export type AgentAnswer =
  | {
      status: 'answered';
      category: Category;
      answer: string;
      query: string;
      attempts: AttemptRecord[];
      facts: Facts;
    }
  | {
      status: 'not_found';
      category: Category;
      answer: string;
      query: string;
      attempts: AttemptRecord[];
    }
  | {
      status: 'failed';
      error: { type: FailureType; message: string };
      /** User-visible text */
      answer: string;
    };
