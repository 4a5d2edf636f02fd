/**
 * Graph Provider Module
 *
 * Exports the GraphClient interface and Neo4j implementation.
 */

// Factory
export { createGraphClient } from './factory';

// Neo4j implementation
export type { Neo4jConfig } from './neo4j';
export { GRAPH_SCHEMA_DESCRIPTION, Neo4jGraphClient } from './neo4j';

// Types
export type {
  Annotation,
  AnnotationEmbeddingUpdate,
  AnnotationInput,
  AnnotationLinkInput,
  Aspect,
  AssociationInput,
  Disease,
  DiseaseInput,
  Gene,
  GeneInput,
  GraphClient,
  GraphCounts,
  GraphErrorType,
  InteractionInput,
  InteractionType,
  QueryRow,
  ReadQueryOptions,
  WriteCounters
} from './types';
export {
  ASPECTS,
  GraphClientError,
  INTERACTION_TYPES,
  isAspect,
  isInteractionType,
  PATHWAY_EVIDENCE
} from './types';
