import { z } from 'zod';
import { ASPECTS, type Aspect } from '@/providers/graph/types';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const embeddingProviders = [
  'openai',
  'google',
  'cohere',
  'mistral',
  'ollama',
  'openai-compatible'
] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

// Operation config schema (for classification, query, answer)
const llmOperationSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  options: z.record(z.string(), z.json()).optional()
});
export type LLMOperationConfig = z.infer<typeof llmOperationSchema>;

// GAF aspect letter -> GO aspect
export type AspectMap = Record<string, Aspect>;

export const DEFAULT_ASPECT_MAP: AspectMap = {
  P: 'Biological Process',
  F: 'Molecular Function',
  C: 'Cellular Component'
};

const aspectMapSchema = z.record(z.string().length(1), z.enum(ASPECTS)).default(DEFAULT_ASPECT_MAP);

function validateProviderAccess(
  data: { provider: string; apiKey?: string; baseUrl?: string; providerName?: string },
  cloudProviders: readonly string[],
  ctx: z.RefinementCtx
): void {
  if (cloudProviders.includes(data.provider)) {
    if (!data.apiKey)
      ctx.addIssue({
        code: 'custom',
        path: ['apiKey'],
        message: `apiKey required for provider '${data.provider}'`
      });
    if (data.baseUrl)
      ctx.addIssue({
        code: 'custom',
        path: ['baseUrl'],
        message: `baseUrl not allowed for provider '${data.provider}'`
      });
  }
  if (data.provider === 'openai-compatible' && !data.baseUrl) {
    ctx.addIssue({
      code: 'custom',
      path: ['baseUrl'],
      message: "baseUrl required for provider 'openai-compatible'"
    });
  }
  if (data.provider !== 'openai-compatible' && data.providerName) {
    ctx.addIssue({
      code: 'custom',
      path: ['providerName'],
      message: "providerName only allowed for provider 'openai-compatible'"
    });
  }
}

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(6370)
      })
      .optional(),

    neo4j: z.object({
      uri: z.string().min(1),
      user: z.string().min(1),
      password: z.string(),
      database: z.string().min(1).default('neo4j')
    }),

    llm: z
      .object({
        provider: z.enum(llmProviders),
        providerName: z.string().min(1).optional(),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional(),
        defaults: llmOperationSchema,
        classification: llmOperationSchema.partial().optional(),
        query: llmOperationSchema.partial().optional(),
        answer: llmOperationSchema.partial().optional()
      })
      .superRefine((data, ctx) =>
        validateProviderAccess(data, ['openai', 'anthropic', 'google'], ctx)
      ),

    embedding: z
      .object({
        provider: z.enum(embeddingProviders),
        providerName: z.string().min(1).optional(),
        model: z.string().min(1),
        dimensions: z.number().int().positive(),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional()
      })
      .superRefine((data, ctx) =>
        validateProviderAccess(data, ['openai', 'google', 'cohere', 'mistral'], ctx)
      ),

    agent: z
      .object({
        retryBudget: z.number().int().min(0).default(1),
        enrichmentConcurrency: z.number().int().positive().default(8),
        timeouts: z
          .object({
            graphMs: z.number().int().positive().default(30_000),
            llmMs: z.number().int().positive().default(60_000),
            searchMs: z.number().int().positive().default(30_000)
          })
          .optional()
      })
      .optional(),

    import: z
      .object({
        pathwayFiles: z.array(z.string().min(1)).default([]),
        annotationFile: z.string().min(1).optional(),
        aspectMap: aspectMapSchema,
        embeddingBatchSize: z.number().int().positive().default(64)
      })
      .optional()
  })
  .transform((data) => {
    // Apply server defaults
    const server = {
      port: data.server?.port ?? 6370
    };

    // Merge operation configs with defaults. Classification and answers
    // run at temperature 0 unless configured otherwise.
    const { defaults, classification, query, answer, ...llmRest } = data.llm;
    const llm = {
      ...llmRest,
      defaults,
      classification: { ...defaults, temperature: 0, ...classification },
      query: { ...defaults, ...query },
      answer: { ...defaults, temperature: 0, ...answer }
    };

    const agent = {
      retryBudget: data.agent?.retryBudget ?? 1,
      enrichmentConcurrency: data.agent?.enrichmentConcurrency ?? 8,
      timeouts: {
        graphMs: data.agent?.timeouts?.graphMs ?? 30_000,
        llmMs: data.agent?.timeouts?.llmMs ?? 60_000,
        searchMs: data.agent?.timeouts?.searchMs ?? 30_000
      }
    };

    const importConfig = {
      pathwayFiles: data.import?.pathwayFiles ?? [],
      annotationFile: data.import?.annotationFile ?? null,
      aspectMap: data.import?.aspectMap ?? DEFAULT_ASPECT_MAP,
      embeddingBatchSize: data.import?.embeddingBatchSize ?? 64
    };

    return { ...data, server, llm, agent, import: importConfig };
  });

export type Config = z.infer<typeof configSchema>;
export type AgentConfig = Config['agent'];
export type ImportConfig = Config['import'];
