/**
 * Neo4j Operations Module
 *
 * Re-exports all operation functions for clean imports.
 */

// Import (upsert) operations
export {
  countEntities,
  getAnnotationsWithoutEmbedding,
  mergeAnnotationLinks,
  mergeAssociations,
  mergeInteractions,
  setAnnotationEmbeddings,
  upsertAnnotations,
  upsertDiseases,
  upsertGenes
} from './import';

// Read operations
export { getGeneAnnotations, runReadQuery } from './read';
