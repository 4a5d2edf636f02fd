/**
 * Agent Prompts
 *
 * One bundle per category. The category picks the bundle explicitly on
 * every call; nothing here is mutated at run time.
 */

import { type Category, NO_ANNOTATION_MARKER } from './types';

/** Returned verbatim, without a model call, when a query finds nothing */
export const NOT_FOUND_ANSWER = 'I could not find the answer in the database. Please try again.';

export interface PromptBundle {
  /** System prompt for the first query of a question */
  query: (schema: string) => string;
  /** User message asking for a repaired query */
  correction: (failedQuery: string, errorMessage: string) => string;
  /** System prompt for the final answer */
  answer: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

export const CLASSIFICATION_PROMPT = `Classify the following questions into one of the categories: 'disease association' or 'downstream interaction'.

Question: 'What disease is PRKN associated with?'
Category: disease association

Question: 'What are the downstream interactions of gene Y?'
Category: downstream interaction

Question: 'Is gene GNAI1 associated with Parkinson disease?'
Category: disease association

Question: 'What genes interact with gene Insulin downstream?'
Category: downstream interaction

Question: 'Is gene Alpha-synuclein associated with Parkinson's?'
Category: disease association

Question: 'What will happen if gene Caspase-3 is either activated or repressed?'
Category: downstream interaction

Answer with the category only.`;

// ═══════════════════════════════════════════════════════════════════════════════
// Query Synthesis
// ═══════════════════════════════════════════════════════════════════════════════

const QUERY_RULES = `Use only the provided node labels, relationship types and properties in the schema.
Do not include any explanations or apologies in your responses.
Do not include any text except the generated Cypher query.
Do not produce the word cypher in front of the query.`;

function correction(failedQuery: string, errorMessage: string): string {
  return `The Cypher statement below returned an error:
${failedQuery}
Error: ${errorMessage}
Please provide an improved Cypher statement that works. DO NOT add any explanations or apologies! I only need the statement.`;
}

const DISEASE_EXAMPLES = `# 'Is gene GNAI1 associated with Parkinson disease?'
MATCH (g:Gene)-[:ASSOCIATED_WITH]->(d:Disease)
WHERE 'GNAI1' IN g.synonyms AND d.name = 'Parkinson disease'
RETURN g.names AS gene_names, g.synonyms AS gene_synonyms, d.name AS disease_name, d.disease_id AS KEGG_pathway

# 'Is gene Alpha-synuclein associated with Parkinson's?'
MATCH (g:Gene)-[:ASSOCIATED_WITH]->(d:Disease)
WHERE 'Alpha-synuclein' IN g.names AND d.name = 'Parkinson disease'
RETURN g.names AS gene_names, g.synonyms AS gene_synonyms, d.name AS disease_name, d.disease_id AS KEGG_pathway`;

/** Paths from the start gene to genes with no outgoing interaction */
function downstreamExample(question: string, disease: string, startFilter: string): string {
  return `# ${question}
MATCH (start:Gene)-[:ASSOCIATED_WITH]->(d:Disease {name: '${disease}'})
WHERE ${startFilter}
CALL apoc.path.expandConfig(start, {relationshipFilter: 'INTERACTS_WITH>', minLevel: 1, uniqueness: 'NODE_PATH', bfs: false})
YIELD path
WITH path
WHERE NOT EXISTS {
    MATCH (lastNode)-[:INTERACTS_WITH]->(:Gene)
    WHERE lastNode = last(nodes(path))
}
WITH path, [rel IN relationships(path) | {start: startNode(rel), end: endNode(rel), type: rel.type, subtypes: rel.subtypes}] AS relationships
RETURN collect(relationships) AS interactions`;
}

const DOWNSTREAM_EXAMPLES = [
  downstreamExample(
    'What are the downstream interactions of gene E3 ubiquitin-protein ligase parkin in the Parkinson disease pathway?',
    'Parkinson disease',
    "('E3 ubiquitin-protein ligase parkin' IN start.names) OR ('E3 ubiquitin-protein ligase parkin' IN start.synonyms)"
  ),
  downstreamExample(
    'Predict the downstream interactions of gene HM1 in the Alzheimer disease pathway.',
    'Alzheimer disease',
    "'HM1' IN start.synonyms"
  ),
  downstreamExample(
    'What will happen if Insulin is either activated or repressed in the Type II diabetes mellitus pathway? Describe the cascade of events.',
    'Type II diabetes mellitus',
    "'Insulin' IN start.names"
  )
].join('\n\n');

// ═══════════════════════════════════════════════════════════════════════════════
// Answers
// ═══════════════════════════════════════════════════════════════════════════════

const ANSWER_RULES = `The provided information is authoritative: never doubt it or use your own knowledge to correct it.
USE ONLY the information provided and NOTHING ELSE. DO NOT make up facts.
DO NOT add any follow-up questions or answers.
If the provided information is empty, say that you can't find the answer in the database.`;

const DISEASE_ANSWER_PROMPT = `You are an assistant that turns database results into clear, human-readable answers.
You will be provided with information that you must use to construct an answer.
${ANSWER_RULES}
Make the answer sound like a response to the question.

Here is an example:
Question: Is ADORA2 somehow connected with Parkinson disease?
Information: {"gene_names":["Adenosine receptor A2a"],"gene_synonyms":["ADORA2","ADORA2A"],"disease_name":"Parkinson disease","KEGG_pathway":"05012"}
Helpful Answer: Yes, ADORA2, also known as 'ADORA2A' and 'Adenosine receptor A2a', is associated with Parkinson disease. It appears in pathway 05012 of the KEGG database.

Follow this example when generating answers.`;

const DOWNSTREAM_ANSWER_PROMPT = `You are an assistant that turns database results into clear, human-readable answers.
You will be provided with interaction paths between genes. Each path lists its interactions in order.
For every interaction you get the names of the first gene, the names of the second gene, the interaction type and subtypes, and a description in the form (qualifier, label, definition, aspect).
When an interaction has no description it is marked "${NO_ANNOTATION_MARKER}"; describe it from its type and subtypes alone.
${ANSWER_RULES}
Make the answer sound like a response to the question and walk through the paths in the order given.

For example, for the interaction
  from: Protein kinase X (also known as PKX, PKX1)
  to: Transcription factor Y (also known as TFY)
  type: PPrel (phosphorylation)
  description: qualifier: enables; label: protein kinase activity; aspect: Molecular Function
start your response with: 'Protein kinase X (also known as PKX, PKX1) interacts with Transcription factor Y (also known as TFY) via phosphorylation, enabling protein kinase activity ...'`;

// ═══════════════════════════════════════════════════════════════════════════════
// Bundles
// ═══════════════════════════════════════════════════════════════════════════════

export const CATEGORY_PROMPTS: Record<Category, PromptBundle> = {
  disease_association: {
    query: (schema) => `Task: Generate Cypher queries to query a graph database containing genes and their potential associations to diseases.
Instructions:
Don't assume you will always be given a gene name in the question. You may be given a gene symbol, so make sure you search in the synonyms property of the gene.
${QUERY_RULES}

Schema:
${schema}

Examples:
${DISEASE_EXAMPLES}`,
    correction,
    answer: DISEASE_ANSWER_PROMPT
  },
  downstream_interaction: {
    query: (schema) => `Task: Generate Cypher queries to predict downstream gene interactions within a graph database.
Instructions:
DO NOT assume you will always be given a gene name in the question. You MAY be given a gene symbol, so make sure you search in the synonyms property of the gene.
Return the interactions of every path as a list of {start, end, type, subtypes} maps in a column named interactions, exactly as the examples do.
${QUERY_RULES}
See ALL the examples below.

Schema:
${schema}

Examples:
${DOWNSTREAM_EXAMPLES}`,
    correction,
    answer: DOWNSTREAM_ANSWER_PROMPT
  }
};
