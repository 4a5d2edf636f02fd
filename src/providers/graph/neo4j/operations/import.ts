/**
 * Neo4j Import Operations
 *
 * Idempotent upserts used by the graph builder. Every write is a single
 * UNWIND + MERGE statement, retried on transient errors, and reports the
 * store's own creation counters.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  Annotation,
  AnnotationEmbeddingUpdate,
  AnnotationInput,
  AnnotationLinkInput,
  AssociationInput,
  DiseaseInput,
  GeneInput,
  GraphCounts,
  InteractionInput,
  WriteCounters
} from '../../types';
import { INTERACTION_TYPES } from '../../types';
import { runCommandWithRetry } from '../errors';
import { recordToAnnotation, toNumber } from '../mapping';
import {
  COUNT_ENTITIES,
  GET_ANNOTATIONS_WITHOUT_EMBEDDING,
  MERGE_ANNOTATION_LINKS,
  MERGE_ANNOTATIONS,
  MERGE_ASSOCIATIONS,
  MERGE_DISEASES,
  MERGE_GENES,
  MERGE_INTERACTIONS,
  SET_ANNOTATION_EMBEDDINGS
} from '../queries';

const NO_WRITES: WriteCounters = { nodesCreated: 0, relationshipsCreated: 0 };

// ============================================================
// WRITE HELPER
// ============================================================

async function runMerge(
  driver: Driver,
  database: string,
  query: string,
  params: Record<string, unknown>,
  operationName: string
): Promise<WriteCounters> {
  return runCommandWithRetry(
    driver,
    database,
    'write',
    async (session) => {
      const result = await session.executeWrite(async (tx) => tx.run(query, params));
      const updates = result.summary.counters.updates();
      return {
        nodesCreated: updates['nodesCreated'] ?? 0,
        relationshipsCreated: updates['relationshipsCreated'] ?? 0
      };
    },
    operationName
  );
}

// ============================================================
// NODE UPSERTS
// ============================================================

export async function upsertDiseases(
  driver: Driver,
  database: string,
  diseases: DiseaseInput[]
): Promise<WriteCounters> {
  if (diseases.length === 0) return NO_WRITES;
  return runMerge(driver, database, MERGE_DISEASES, { diseases }, 'upsertDiseases');
}

export async function upsertGenes(
  driver: Driver,
  database: string,
  genes: GeneInput[]
): Promise<WriteCounters> {
  if (genes.length === 0) return NO_WRITES;
  return runMerge(driver, database, MERGE_GENES, { genes }, 'upsertGenes');
}

export async function upsertAnnotations(
  driver: Driver,
  database: string,
  annotations: AnnotationInput[]
): Promise<WriteCounters> {
  if (annotations.length === 0) return NO_WRITES;
  return runMerge(driver, database, MERGE_ANNOTATIONS, { annotations }, 'upsertAnnotations');
}

// ============================================================
// RELATIONSHIP MERGES
// ============================================================

/**
 * Both endpoints must already exist; rows whose genes are missing
 * match nothing and write nothing.
 */
export async function mergeInteractions(
  driver: Driver,
  database: string,
  interactions: InteractionInput[]
): Promise<WriteCounters> {
  if (interactions.length === 0) return NO_WRITES;
  const rows = interactions.map((interaction) => ({
    ...interaction,
    typeDescription: INTERACTION_TYPES[interaction.type]
  }));
  return runMerge(driver, database, MERGE_INTERACTIONS, { interactions: rows }, 'mergeInteractions');
}

export async function mergeAssociations(
  driver: Driver,
  database: string,
  associations: AssociationInput[]
): Promise<WriteCounters> {
  if (associations.length === 0) return NO_WRITES;
  return runMerge(driver, database, MERGE_ASSOCIATIONS, { associations }, 'mergeAssociations');
}

export async function mergeAnnotationLinks(
  driver: Driver,
  database: string,
  links: AnnotationLinkInput[]
): Promise<WriteCounters> {
  if (links.length === 0) return NO_WRITES;
  return runMerge(driver, database, MERGE_ANNOTATION_LINKS, { links }, 'mergeAnnotationLinks');
}

// ============================================================
// EMBEDDINGS
// ============================================================

export async function getAnnotationsWithoutEmbedding(
  driver: Driver,
  database: string,
  limit: number
): Promise<Annotation[]> {
  return runCommandWithRetry(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.executeRead(async (tx) =>
        tx.run(GET_ANNOTATIONS_WITHOUT_EMBEDDING, { limit: neo4j.int(limit) })
      );
      return result.records.map((r) => recordToAnnotation(r.get('a')));
    },
    'getAnnotationsWithoutEmbedding'
  );
}

export async function setAnnotationEmbeddings(
  driver: Driver,
  database: string,
  updates: AnnotationEmbeddingUpdate[]
): Promise<void> {
  if (updates.length === 0) return;
  await runMerge(driver, database, SET_ANNOTATION_EMBEDDINGS, { updates }, 'setAnnotationEmbeddings');
}

// ============================================================
// STATISTICS
// ============================================================

export async function countEntities(driver: Driver, database: string): Promise<GraphCounts> {
  return runCommandWithRetry(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.executeRead(async (tx) => tx.run(COUNT_ENTITIES));
      const record = result.records[0];
      return {
        genes: toNumber(record?.get('genes')),
        diseases: toNumber(record?.get('diseases')),
        annotations: toNumber(record?.get('annotations')),
        interactions: toNumber(record?.get('interactions')),
        associations: toNumber(record?.get('associations')),
        annotationLinks: toNumber(record?.get('annotationLinks'))
      };
    },
    'countEntities'
  );
}
