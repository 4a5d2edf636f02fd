/**
 * Intent Classifier Tests
 */

import { describe, expect, test } from 'vitest';
import { createFakeLLMClient } from '@tests/helpers/mocks';
import { classify, parseCategoryLabel } from '@/core/agent/classifier';
import { CLASSIFICATION_PROMPT } from '@/core/agent/prompts';
import { ClassificationAmbiguousError } from '@/core/errors';

describe('parseCategoryLabel', () => {
  test('maps the two labels', () => {
    expect(parseCategoryLabel('disease association')).toBe('disease_association');
    expect(parseCategoryLabel('downstream interaction')).toBe('downstream_interaction');
  });

  test('ignores case, punctuation and surrounding text', () => {
    expect(parseCategoryLabel('  Category: Downstream Interaction.\n')).toBe('downstream_interaction');
  });

  test('rejects a label naming both categories', () => {
    expect(() => parseCategoryLabel('disease association or downstream interaction')).toThrow(
      ClassificationAmbiguousError
    );
  });

  test('rejects a label naming neither and keeps it for the report', () => {
    let caught: unknown;
    try {
      parseCategoryLabel('  protein structure \n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClassificationAmbiguousError);
    expect(caught instanceof ClassificationAmbiguousError && caught.rawLabel).toBe('protein structure');
  });
});

describe('classify', () => {
  test('sends the few-shot prompt and the question', async () => {
    const llm = createFakeLLMClient(['downstream interaction']);

    const category = await classify('What is downstream of SNCA?', llm, { timeoutMs: 1_000 });

    expect(category).toBe('downstream_interaction');
    expect(llm.calls[0]?.messages).toEqual([
      { role: 'system', content: CLASSIFICATION_PROMPT },
      { role: 'user', content: 'Question: What is downstream of SNCA?\nCategory:' }
    ]);
  });

  test('always classifies at temperature 0', async () => {
    const llm = createFakeLLMClient(['disease association']);

    await classify('Is PRKN linked to Parkinson disease?', llm, {
      temperature: 0.7,
      maxTokens: 16,
      timeoutMs: 1_000
    });

    const options = llm.calls[0]?.options;
    expect(options?.temperature).toBe(0);
    expect(options?.maxTokens).toBe(16);
    expect(options?.abortSignal).toBeInstanceOf(AbortSignal);
    expect(options).not.toHaveProperty('timeoutMs');
  });

  test('propagates an ambiguous label', async () => {
    const llm = createFakeLLMClient(['I am not sure']);

    await expect(classify('Tell me about genes', llm, { timeoutMs: 1_000 })).rejects.toBeInstanceOf(
      ClassificationAmbiguousError
    );
  });
});
