/**
 * Answer Synthesizer
 *
 * Turns retrieved facts into the user-facing answer. Nothing found means
 * the fixed not-found answer, with no model call.
 */

import type { LLMClient } from '@/providers/llm/types';
import { completeWithSettings } from './completion';
import { CATEGORY_PROMPTS, NOT_FOUND_ANSWER } from './prompts';
import type { Category, EnrichedEdge, Facts, GeneRef, LLMCallSettings } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Fact Formatting
// ═══════════════════════════════════════════════════════════════════════════════

/** "Primary (also known as a, b)" from a gene's names and synonyms */
export function describeGene(gene: GeneRef): string {
  const all = [...new Set([...gene.names, ...gene.synonyms])];
  const [primary, ...aliases] = all;
  if (primary === undefined) return gene.id;
  if (aliases.length === 0) return primary;
  return `${primary} (also known as ${aliases.join(', ')})`;
}

function describeEdge(edge: EnrichedEdge, index: number): string {
  const subtypes = edge.subtypes.length > 0 ? ` (${edge.subtypes.join(', ')})` : '';
  const { annotation } = edge;
  const description =
    annotation.status === 'annotated'
      ? [
          `qualifier: ${annotation.qualifiers.join(', ')}`,
          `label: ${annotation.label ?? ''}`,
          `definition: ${annotation.definition ?? ''}`,
          `aspect: ${annotation.aspect}`
        ].join('; ')
      : annotation.marker;

  return [
    `  ${index + 1}. from: ${describeGene(edge.start)}`,
    `     to: ${describeGene(edge.end)}`,
    `     type: ${edge.type}${subtypes}`,
    `     description: ${description}`
  ].join('\n');
}

/**
 * Facts as prompt text: one JSON object per row for associations,
 * numbered paths of numbered interactions for downstream results.
 */
export function formatFacts(facts: Facts): string {
  switch (facts.kind) {
    case 'empty':
      return '';
    case 'disease_association':
      return facts.rows.map((row) => JSON.stringify(row)).join('\n');
    case 'downstream_interaction':
      return facts.paths
        .filter((path) => path.length > 0)
        .map((path, i) => [`Path ${i + 1}:`, ...path.map(describeEdge)].join('\n'))
        .join('\n\n');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════════════════

export async function render(
  question: string,
  facts: Facts,
  category: Category,
  llm: LLMClient,
  settings: LLMCallSettings
): Promise<string> {
  if (facts.kind === 'empty') return NOT_FOUND_ANSWER;

  const answer = await completeWithSettings(
    llm,
    [
      { role: 'system', content: CATEGORY_PROMPTS[category].answer },
      {
        role: 'user',
        content: `Question: ${question}\nInformation:\n${formatFacts(facts)}\nHelpful Answer:`
      }
    ],
    { ...settings, temperature: 0 }
  );
  return answer.trim();
}
