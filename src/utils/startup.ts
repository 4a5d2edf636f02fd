/**
 * Startup Display
 *
 * Prints the initialization steps and the endpoints once the server is up.
 */

import type { Config } from '@/config/schema';
import type { GraphCounts } from '@/providers/graph/types';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupInfo {
  /** Neo4j connection URI */
  neo4jUri: string;
  /** Entity counts at startup, null when the graph could not be counted */
  counts: GraphCounts | null;
  embedding: {
    provider: string;
    model: string;
    dimensions: number;
  };
  llm: {
    provider: string;
    classificationModel: string;
    queryModel: string;
    answerModel: string;
  };
  retryBudget: number;
}

/** Divider line */
const DIVIDER = '━'.repeat(78);

// ═══════════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════════

function logStep(label: string, detail?: string): void {
  const check = c.brightGreen('✓');
  const labelText = c.white(label);
  const detailText = detail ? c.dim(detail) : '';

  // Align details to column 30
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${check} ${labelText}${' '.repeat(padding)}${detailText}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  const methodText = methodColor(method.padEnd(6));
  const pathText = c.cyan(path.padEnd(24));
  const descText = c.dim(description);
  console.log(`    • ${methodText} ${pathText} ${descText}`);
}

function describeCounts(counts: GraphCounts | null): string {
  if (!counts) return 'counts unavailable';
  return `${counts.genes} genes, ${counts.diseases} diseases, ${counts.interactions} interactions`;
}

function describeModels(llm: StartupInfo['llm']): string {
  const models = new Set([llm.classificationModel, llm.queryModel, llm.answerModel]);
  return `${llm.provider}/${[...models].join(', ')}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

export function displayStartup(config: Config, info: StartupInfo): void {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  logStep('Configuration loaded');
  logStep('Neo4j connected', info.neo4jUri);
  logStep('Graph schema ready', describeCounts(info.counts));

  const embeddingInfo = `${info.embedding.provider}/${info.embedding.model} (${info.embedding.dimensions}d)`;
  logStep('Embedding client ready', embeddingInfo);
  logStep('LLM client ready', describeModels(info.llm));
  logStep('Retry budget', String(info.retryBudget));

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.heading('Endpoints:')}`);
  displayEndpoint('POST', '/ask', 'Answer a gene or disease question');
  displayEndpoint('POST', '/import', 'Merge the configured pathway and annotation files');
  displayEndpoint('POST', '/mcp', 'Model Context Protocol (graph questions)');
  displayEndpoint('GET', '/health', 'Health check');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

export function buildStartupInfo(config: Config, counts: GraphCounts | null): StartupInfo {
  return {
    neo4jUri: config.neo4j.uri,
    counts,
    embedding: {
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions
    },
    llm: {
      provider: config.llm.provider,
      classificationModel: config.llm.classification.model,
      queryModel: config.llm.query.model,
      answerModel: config.llm.answer.model
    },
    retryBudget: config.agent.retryBudget
  };
}
