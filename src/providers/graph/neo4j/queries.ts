/**
 * Neo4j Query Repository
 *
 * Centralized Cypher for the importer and the agent's fixed lookups.
 * Queries generated by the LLM never come through here.
 */

import { PATHWAY_EVIDENCE } from '../types';
import { LABELS, RELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * One uniqueness constraint per merge key. The constraint also gives
 * MERGE an index to look the key up with.
 */
export const CONSTRAINTS = {
  GENE_ID: `CREATE CONSTRAINT gene_id_unique IF NOT EXISTS FOR (g:${LABELS.GENE}) REQUIRE g.id IS UNIQUE`,
  DISEASE_ID: `CREATE CONSTRAINT disease_id_unique IF NOT EXISTS FOR (d:${LABELS.DISEASE}) REQUIRE d.disease_id IS UNIQUE`,
  ANNOTATION_ID: `CREATE CONSTRAINT annotation_go_id_unique IF NOT EXISTS FOR (a:${LABELS.ANNOTATION}) REQUIRE a.go_id IS UNIQUE`
} as const;

// ============================================================
// LIST UNION
// ============================================================

/**
 * Ordered set union of an existing list property and incoming values.
 * Existing order is kept, new values are appended once.
 */
function listUnion(existing: string, incoming: string): string {
  return `reduce(acc = coalesce(${existing}, []), value IN ${incoming} | CASE WHEN value IN acc THEN acc ELSE acc + value END)`;
}

// ============================================================
// NODE UPSERTS
// ============================================================

export const MERGE_DISEASES = `
  UNWIND $diseases AS disease
  MERGE (d:${LABELS.DISEASE} {disease_id: disease.diseaseId})
  SET d.name = disease.name
`;

/**
 * Names, synonyms and KEGG ids only grow: a re-import with fewer values
 * leaves the stored lists untouched.
 */
export const MERGE_GENES = `
  UNWIND $genes AS gene
  MERGE (g:${LABELS.GENE} {id: gene.id})
  SET
    g.names = ${listUnion('g.names', 'gene.names')},
    g.synonyms = ${listUnion('g.synonyms', 'gene.synonyms')},
    g.kegg_ids = ${listUnion('g.kegg_ids', 'gene.keggIds')},
    g.object_type = coalesce(gene.objectType, g.object_type)
`;

export const MERGE_ANNOTATIONS = `
  UNWIND $annotations AS annotation
  MERGE (a:${LABELS.ANNOTATION} {go_id: annotation.goId})
  SET
    a.label = coalesce(annotation.label, a.label),
    a.definition = coalesce(annotation.definition, a.definition),
    a.aspect = annotation.aspect,
    a.qualifiers = ${listUnion('a.qualifiers', 'annotation.qualifiers')}
`;

// ============================================================
// RELATIONSHIP MERGES
// ============================================================

/**
 * The MERGE pattern carries only `type`, so (source, target, type) is the
 * natural key. A second relation of another type between the same genes
 * becomes a parallel edge.
 */
export const MERGE_INTERACTIONS = `
  UNWIND $interactions AS interaction
  MATCH (source:${LABELS.GENE} {id: interaction.sourceId})
  MATCH (target:${LABELS.GENE} {id: interaction.targetId})
  MERGE (source)-[r:${RELS.INTERACTS_WITH} {type: interaction.type}]->(target)
  SET
    r.type_description = interaction.typeDescription,
    r.subtypes = ${listUnion('r.subtypes', 'interaction.subtypes')},
    r.pathway_ids = ${listUnion('r.pathway_ids', '[interaction.pathwayId]')}
`;

/**
 * Map-only evidence never replaces annotation evidence, so re-importing
 * the maps without the annotation file keeps the stored codes.
 */
export const MERGE_ASSOCIATIONS = `
  UNWIND $associations AS association
  MATCH (g:${LABELS.GENE} {id: association.geneId})
  MATCH (d:${LABELS.DISEASE} {disease_id: association.diseaseId})
  MERGE (g)-[r:${RELS.ASSOCIATED_WITH}]->(d)
  SET r.evidence = CASE
    WHEN association.evidence = '${PATHWAY_EVIDENCE}' AND r.evidence IS NOT NULL THEN r.evidence
    ELSE association.evidence
  END
`;

export const MERGE_ANNOTATION_LINKS = `
  UNWIND $links AS link
  MATCH (g:${LABELS.GENE} {id: link.geneId})
  MATCH (a:${LABELS.ANNOTATION} {go_id: link.goId})
  MERGE (g)-[:${RELS.HAS_GO_ANNOTATION}]->(a)
`;

// ============================================================
// EMBEDDINGS
// ============================================================

export const GET_ANNOTATIONS_WITHOUT_EMBEDDING = `
  MATCH (a:${LABELS.ANNOTATION})
  WHERE a.embedding IS NULL
  RETURN a
  ORDER BY a.go_id
  LIMIT $limit
`;

export const SET_ANNOTATION_EMBEDDINGS = `
  UNWIND $updates AS update
  MATCH (a:${LABELS.ANNOTATION} {go_id: update.goId})
  SET a.embedding = update.embedding
`;

// ============================================================
// READ QUERIES
// ============================================================

/**
 * Annotations per gene. OPTIONAL MATCH keeps genes with no annotations
 * in the result with an empty list.
 */
export const GET_GENE_ANNOTATIONS = `
  UNWIND $geneIds AS geneId
  OPTIONAL MATCH (:${LABELS.GENE} {id: geneId})-[:${RELS.HAS_GO_ANNOTATION}]->(a:${LABELS.ANNOTATION})
  RETURN geneId, collect(a) AS annotations
`;

export const COUNT_ENTITIES = `
  RETURN
    COUNT { (:${LABELS.GENE}) } AS genes,
    COUNT { (:${LABELS.DISEASE}) } AS diseases,
    COUNT { (:${LABELS.ANNOTATION}) } AS annotations,
    COUNT { ()-[:${RELS.INTERACTS_WITH}]->() } AS interactions,
    COUNT { ()-[:${RELS.ASSOCIATED_WITH}]->() } AS associations,
    COUNT { ()-[:${RELS.HAS_GO_ANNOTATION}]->() } AS annotationLinks
`;
