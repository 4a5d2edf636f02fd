/**
 * Core
 *
 * Public API barrel file. Re-exports the graph builder and the question-answering agent.
 *
 * @example
 * ```typescript
 * import { GeneGraphAgent, GraphBuilder } from '@/core';
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Graph Construction
// ═══════════════════════════════════════════════════════════════════════════════

export {
  GraphBuilder,
  isImportRunning,
  readAnnotationSource,
  readPathwaySources,
  resolveGeneKey
} from './graph-builder';

export type { BuildOptions, ImportReport, SkippedRecord, SourceDocument } from './graph-builder';

// ═══════════════════════════════════════════════════════════════════════════════
// Agent
// ═══════════════════════════════════════════════════════════════════════════════

export { createAgentSettings, GeneGraphAgent, NOT_FOUND_ANSWER } from './agent';

export type { AgentAnswer, AgentDependencies, AgentSettings, AttemptRecord, Category } from './agent';

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

export * from './errors';
