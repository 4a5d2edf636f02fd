/**
 * Agent Integration Tests
 *
 * Builds the fixture graph into the in-process store, then answers
 * questions end to end: classification, synthesis, execution with retry,
 * enrichment from the imported annotations, and the answer call.
 * Query results are scripted; everything else runs for real.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { createTestSettings, loadAnnotationFixture, loadPathwayFixtures } from '@tests/helpers/fixtures';
import {
  createFakeEmbeddingClient,
  createFakeLLMClient,
  FakeGraphClient,
  type FakeEmbeddingClient
} from '@tests/helpers/mocks';
import { GeneGraphAgent } from '@/core/agent/agent';
import { DEFAULT_ASPECT_MAP } from '@/config/schema';
import { GraphBuilder } from '@/core/graph-builder/builder';
import { GraphClientError } from '@/providers/graph/types';
import type { LLMClient } from '@/providers/llm/types';

const DISEASE_QUERY = `MATCH (g:Gene)-[:ASSOCIATED_WITH]->(d:Disease)
WHERE 'SNCA' IN g.synonyms AND d.name = 'Parkinson disease'
RETURN g.names AS gene_names, g.synonyms AS gene_synonyms, d.name AS disease_name, d.disease_id AS KEGG_pathway`;

let graphClient: FakeGraphClient;
let embeddingClient: FakeEmbeddingClient;

beforeEach(async () => {
  graphClient = new FakeGraphClient();
  embeddingClient = createFakeEmbeddingClient();
  await new GraphBuilder(graphClient).build(
    await loadPathwayFixtures(),
    await loadAnnotationFixture(),
    DEFAULT_ASPECT_MAP,
    { embeddingClient }
  );
});

function createAgent(llm: { classification: LLMClient; query: LLMClient; answer: LLMClient }): GeneGraphAgent {
  return new GeneGraphAgent({ graphClient, embeddingClient, llm }, createTestSettings());
}

/** A stored gene as the store returns it inside a path */
function geneNode(id: string): Record<string, unknown> {
  const gene = graphClient.genes.get(id);
  if (!gene) throw new Error(`fixture gene ${id} missing`);
  return { ...gene };
}

describe('disease association questions', () => {
  test('answers from the association rows', async () => {
    const rows = [
      {
        gene_names: ['Alpha-synuclein'],
        gene_synonyms: ['SNCA', 'NACP'],
        disease_name: 'Parkinson disease',
        KEGG_pathway: '05012'
      }
    ];
    graphClient.scriptReads(rows);
    const answer = createFakeLLMClient(['Yes, SNCA is associated with Parkinson disease (pathway 05012).']);
    const agent = createAgent({
      classification: createFakeLLMClient(['disease association']),
      query: createFakeLLMClient([`\`\`\`cypher\n${DISEASE_QUERY}\n\`\`\``]),
      answer
    });

    const result = await agent.ask('Is SNCA associated with Parkinson disease?');

    expect(result).toEqual({
      status: 'answered',
      category: 'disease_association',
      answer: 'Yes, SNCA is associated with Parkinson disease (pathway 05012).',
      query: DISEASE_QUERY,
      attempts: [{ attempt: 1, query: DISEASE_QUERY, error: null }],
      facts: { kind: 'disease_association', rows }
    });
    expect(graphClient.readQueries).toEqual([DISEASE_QUERY]);
    expect(answer.calls[0]?.messages[1]?.content).toContain(JSON.stringify(rows[0]));
  });

  test('recovers from a failed first query', async () => {
    graphClient.scriptReads(new GraphClientError('Unknown function NOPE', 'QUERY_ERROR'), [
      { disease_name: 'Parkinson disease' }
    ]);
    const query = createFakeLLMClient(['MATCH (g:Gene) RETURN NOPE(g)', DISEASE_QUERY]);
    const agent = createAgent({
      classification: createFakeLLMClient(['disease association']),
      query,
      answer: createFakeLLMClient(['Yes.'])
    });

    const result = await agent.ask('Is SNCA associated with Parkinson disease?');

    expect(result.status).toBe('answered');
    if (result.status !== 'answered') return;
    expect(result.query).toBe(DISEASE_QUERY);
    expect(result.attempts.map((attempt) => attempt.error?.kind ?? 'ok')).toEqual(['query_error', 'ok']);
    expect(query.calls[1]?.messages[1]?.content).toContain(
      'MATCH (g:Gene) RETURN NOPE(g)\nError: Unknown function NOPE'
    );
  });
});

describe('downstream interaction questions', () => {
  test('enriches every interaction before answering', async () => {
    graphClient.scriptReads([
      {
        interactions: [
          [
            { start: geneNode('PRKN'), end: geneNode('SNCA'), type: 'PPrel', subtypes: ['activation', 'binding'] },
            { start: geneNode('SNCA'), end: geneNode('GNAI1'), type: 'GErel', subtypes: ['expression'] }
          ],
          [{ start: geneNode('SNCA'), end: geneNode('APOE'), type: 'PPrel', subtypes: ['inhibition'] }]
        ]
      }
    ]);
    const answer = createFakeLLMClient(['Parkin activates and binds alpha-synuclein.']);
    const agent = createAgent({
      classification: createFakeLLMClient(['downstream interaction']),
      query: createFakeLLMClient(['MATCH p = (:Gene)-[:INTERACTS_WITH*]->(:Gene) RETURN p']),
      answer
    });

    const result = await agent.ask('What are the downstream interactions of PRKN in Parkinson disease?');

    expect(result.status).toBe('answered');
    if (result.status !== 'answered' || result.facts.kind !== 'downstream_interaction') return;

    const goIds = result.facts.paths.map((path) =>
      path.map((edge) => (edge.annotation.status === 'annotated' ? edge.annotation.go_id : null))
    );
    expect(goIds).toEqual([['GO:0061630', 'GO:0006915'], ['GO:0006915']]);

    const [first] = result.facts.paths[0] ?? [];
    expect(first?.annotation.status === 'annotated' && first.annotation.score).toBeCloseTo(1);

    const prompt = answer.calls[0]?.messages[1]?.content ?? '';
    expect(prompt).toContain(
      '     description: qualifier: enables; label: ubiquitin protein ligase activity; definition: Catalysis of the transfer of ubiquitin to a substrate protein.; aspect: Molecular Function'
    );
    expect(prompt).toContain('Path 2:\n  1. from: Alpha-synuclein (also known as SNCA, NACP)\n     to: Apolipoprotein E (also known as APOE, AD2, APOEX)');
    expect(result.answer).toBe('Parkin activates and binds alpha-synuclein.');
  });

  test('answers not_found when every path is empty', async () => {
    graphClient.scriptReads([{ interactions: [] }]);
    const answer = createFakeLLMClient();
    const agent = createAgent({
      classification: createFakeLLMClient(['downstream interaction']),
      query: createFakeLLMClient(['MATCH (g:Gene) RETURN [] AS interactions']),
      answer
    });

    const result = await agent.ask('What is downstream of GNAI1?');

    expect(result.status).toBe('not_found');
    expect(answer.calls).toHaveLength(0);
    expect(graphClient.annotationLookups).toBe(0);
  });

  test('gives up after one correction when the result keeps the wrong shape', async () => {
    graphClient.scriptReads([{ genes: ['SNCA'] }], [{ genes: ['GNAI1'] }]);
    const query = createFakeLLMClient(['MATCH (g:Gene) RETURN g.id AS genes', 'MATCH (g:Gene) RETURN g.id AS genes']);
    const agent = createAgent({
      classification: createFakeLLMClient(['downstream interaction']),
      query,
      answer: createFakeLLMClient()
    });

    const result = await agent.ask('What is downstream of SNCA?');

    expect(result.status).toBe('failed');
    expect(result.status === 'failed' && result.error.type).toBe('RetryBudgetExhausted');
    expect(graphClient.readQueries).toHaveLength(2);
    expect(query.calls).toHaveLength(2);
  });
});
