/**
 * Neo4j Schema Registry
 *
 * Single source of truth for all database schema elements.
 * Using constants prevents typos and enables IDE autocomplete.
 */

import { ASPECTS, INTERACTION_TYPES } from '../types';

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Node labels in the gene graph.
 *
 * - Gene: merged from pathway entries and annotation rows
 * - Disease: one per pathway map
 * - Annotation: GO term
 */
export const LABELS = {
  GENE: 'Gene',
  DISEASE: 'Disease',
  ANNOTATION: 'Annotation'
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * - INTERACTS_WITH: Gene -> Gene (pathway relation)
 * - ASSOCIATED_WITH: Gene -> Disease (pathway membership)
 * - HAS_GO_ANNOTATION: Gene -> Annotation
 */
export const RELS = {
  INTERACTS_WITH: 'INTERACTS_WITH',
  ASSOCIATED_WITH: 'ASSOCIATED_WITH',
  HAS_GO_ANNOTATION: 'HAS_GO_ANNOTATION'
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

// ============================================================
// SCHEMA DESCRIPTION
// ============================================================

const interactionTypeLines = Object.entries(INTERACTION_TYPES)
  .map(([type, meaning]) => `    ${type}: ${meaning}`)
  .join('\n');

/**
 * Schema text injected into every query-synthesis prompt.
 * Must list exactly the labels, relationships and properties written by the builder.
 */
export const GRAPH_SCHEMA_DESCRIPTION = `Node properties:
${LABELS.GENE} {id: STRING, names: LIST<STRING>, synonyms: LIST<STRING>, kegg_ids: LIST<STRING>, object_type: STRING}
${LABELS.DISEASE} {disease_id: STRING, name: STRING}
${LABELS.ANNOTATION} {go_id: STRING, label: STRING, definition: STRING, aspect: STRING, qualifiers: LIST<STRING>}
Relationship properties:
${RELS.INTERACTS_WITH} {type: STRING, type_description: STRING, subtypes: LIST<STRING>, pathway_ids: LIST<STRING>}
${RELS.ASSOCIATED_WITH} {evidence: STRING}
The relationships:
(:${LABELS.GENE})-[:${RELS.INTERACTS_WITH}]->(:${LABELS.GENE})
(:${LABELS.GENE})-[:${RELS.ASSOCIATED_WITH}]->(:${LABELS.DISEASE})
(:${LABELS.GENE})-[:${RELS.HAS_GO_ANNOTATION}]->(:${LABELS.ANNOTATION})
Value sets:
  ${LABELS.ANNOTATION}.aspect is one of: ${ASPECTS.join(', ')}
  ${RELS.INTERACTS_WITH}.type is one of:
${interactionTypeLines}`;

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/**
 * Retry settings for transient write errors.
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100
} as const;
