/**
 * Schema-Aware Query Synthesizer
 *
 * Writes the Cypher for a question, and rewrites it after a failed attempt.
 * Model output is reduced to the bare statement before it is executed.
 */

import type { LLMClient } from '@/providers/llm/types';
import { QuerySynthesisError } from '../errors';
import { completeWithSettings } from './completion';
import { CATEGORY_PROMPTS } from './prompts';
import type { Category, LLMCallSettings } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Sanitizing
// ═══════════════════════════════════════════════════════════════════════════════

const FENCED_BLOCK = /```(?:cypher|sql)?[ \t]*\n?([\s\S]*?)```/i;

/** A leading "cypher" that labels the statement rather than starting it */
const LEADING_LANGUAGE_TAG = /^cypher\s*(?::\s*|\n|(?=(?:MATCH|OPTIONAL|CALL|WITH|UNWIND|RETURN)\b))/i;

/**
 * Reduce model output to the query text: the first fenced block if there
 * is one, without a leading `cypher` tag.
 *
 * @throws QuerySynthesisError when nothing is left
 */
export function sanitizeQuery(output: string): string {
  const fenced = FENCED_BLOCK.exec(output);
  let query = (fenced?.[1] ?? output).trim();
  query = query.replace(LEADING_LANGUAGE_TAG, '').trim();

  if (query.length === 0) {
    throw new QuerySynthesisError('The model returned no query');
  }
  return query;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Synthesis
// ═══════════════════════════════════════════════════════════════════════════════

export async function synthesizeQuery(
  question: string,
  category: Category,
  schema: string,
  llm: LLMClient,
  settings: LLMCallSettings
): Promise<string> {
  const output = await completeWithSettings(
    llm,
    [
      { role: 'system', content: CATEGORY_PROMPTS[category].query(schema) },
      { role: 'user', content: question }
    ],
    settings
  );
  return sanitizeQuery(output);
}

/**
 * Ask for a repaired query. Same instructions and schema as the first
 * attempt, with the failed statement and its error as the request.
 */
export async function correctQuery(
  failedQuery: string,
  errorMessage: string,
  category: Category,
  schema: string,
  llm: LLMClient,
  settings: LLMCallSettings
): Promise<string> {
  const prompts = CATEGORY_PROMPTS[category];
  const output = await completeWithSettings(
    llm,
    [
      { role: 'system', content: prompts.query(schema) },
      { role: 'user', content: prompts.correction(failedQuery, errorMessage) }
    ],
    settings
  );
  return sanitizeQuery(output);
}
