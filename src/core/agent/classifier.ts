/**
 * Intent Classifier
 *
 * Routes a question to one of the two query categories with a single
 * few-shot completion.
 */

import type { LLMClient } from '@/providers/llm/types';
import { ClassificationAmbiguousError } from '../errors';
import { completeWithSettings } from './completion';
import { CLASSIFICATION_PROMPT } from './prompts';
import type { Category, LLMCallSettings } from './types';

const LABEL_KEYWORDS: ReadonlyArray<readonly [keyword: string, category: Category]> = [
  ['disease', 'disease_association'],
  ['downstream', 'downstream_interaction']
];

/**
 * Map a raw model label to a category. The label must name exactly one.
 *
 * @throws ClassificationAmbiguousError when it names neither or both
 */
export function parseCategoryLabel(rawLabel: string): Category {
  const label = rawLabel.toLowerCase();
  const matches = LABEL_KEYWORDS.filter(([keyword]) => label.includes(keyword));
  const [match] = matches;
  if (matches.length !== 1 || !match) {
    throw new ClassificationAmbiguousError(rawLabel.trim());
  }
  return match[1];
}

export async function classify(
  question: string,
  llm: LLMClient,
  settings: LLMCallSettings
): Promise<Category> {
  const label = await completeWithSettings(
    llm,
    [
      { role: 'system', content: CLASSIFICATION_PROMPT },
      { role: 'user', content: `Question: ${question}\nCategory:` }
    ],
    // Routing must be reproducible
    { ...settings, temperature: 0 }
  );
  return parseCategoryLabel(label);
}
