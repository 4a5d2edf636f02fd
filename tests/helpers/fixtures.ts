/**
 * Test Fixtures
 *
 * Shared test data: two small pathway maps, an annotation file and a
 * valid config. Keep these minimal and focused on what each test needs.
 *
 * The files under tests/fixtures describe:
 * - hsa05012 (Parkinson disease): PRKN, SNCA, GNAI1, a compound, and a
 *   gene entry with no symbol; one relation per skip reason
 * - hsa05010 (Alzheimer disease, map number only in the file name):
 *   SNCA and APOE
 * - hsa05014 (ALS, loaded on its own): FUS and TARDBP with truncated
 *   graphics labels, joined by a PPrel and a GErel relation
 * - annotations.gaf: three matched rows, one joined through a synonym,
 *   one unmatched, one short, one with a bad GO id, one with an
 *   unmapped aspect
 */

import { fileURLToPath } from 'node:url';
import { readPathwaySources, readSource } from '@/core/graph-builder/sources';
import type { SourceDocument } from '@/core/graph-builder/types';
import type { AgentSettings, LLMCallSettings } from '@/core/agent/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Source Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export const PATHWAY_FIXTURES = ['hsa05012.xml', 'hsa05010.xml'] as const;

export const ANNOTATION_FIXTURE = 'annotations.gaf';

export function loadPathwayFixtures(): Promise<SourceDocument[]> {
  return readPathwaySources(PATHWAY_FIXTURES.map(fixturePath));
}

export function loadAnnotationFixture(): Promise<SourceDocument> {
  return readSource(fixturePath(ANNOTATION_FIXTURE));
}

export function loadAlsFixture(): Promise<SourceDocument> {
  return readSource(fixturePath('hsa05014.xml'));
}

/** Minimal valid pathway document */
export function kgmlDocument(body: string, attributes = 'name="path:hsa00001" number="00001" title="Test pathway"'): string {
  return `<?xml version="1.0"?>\n<pathway ${attributes}>\n${body}\n</pathway>`;
}

/** One GAF line from its first twelve columns, padded to the mandatory fifteen */
export function gafLine(columns: string[], trailing: string[] = []): string {
  const padded = [...columns];
  while (padded.length < 12) padded.push('');
  return [...padded, 'taxon:9606', '20200101', 'UniProt', '', '', ...trailing].join('\t');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config for testing */
export const VALID_MINIMAL_CONFIG = {
  neo4j: {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'test-secret'
  },
  llm: {
    provider: 'openai' as const,
    apiKey: 'test-secret',
    defaults: {
      model: 'gpt-4o-mini'
    }
  },
  embedding: {
    provider: 'openai' as const,
    apiKey: 'test-secret',
    model: 'text-embedding-3-small',
    dimensions: 1536
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Agent Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_SCHEMA = 'Node properties: Gene {id, names, synonyms}';

const callSettings: LLMCallSettings = { timeoutMs: 1_000 };

export function createTestSettings(overrides?: Partial<AgentSettings>): AgentSettings {
  return {
    retryBudget: 1,
    enrichmentConcurrency: 4,
    schema: TEST_SCHEMA,
    graphTimeoutMs: 1_000,
    searchTimeoutMs: 1_000,
    classification: callSettings,
    query: callSettings,
    answer: callSettings,
    ...overrides
  };
}
