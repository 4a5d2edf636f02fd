/**
 * Neo4j Read Operations
 *
 * The agent's only way into the store: generated queries run in a read
 * transaction with a deadline, and annotation lookups are batched per
 * call. Neither retries; the executor owns the retry budget.
 */

import { type Driver, isNode, type Node } from 'neo4j-driver';
import type { Annotation, QueryRow, ReadQueryOptions } from '../../types';
import { runCommand } from '../errors';
import { recordToAnnotation, toQueryRow } from '../mapping';
import { GET_GENE_ANNOTATIONS } from '../queries';

/**
 * Run a generated query. A write clause fails inside the read
 * transaction and surfaces as QUERY_ERROR.
 */
export async function runReadQuery(
  driver: Driver,
  database: string,
  cypher: string,
  options: ReadQueryOptions = {}
): Promise<QueryRow[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.executeRead(async (tx) => tx.run(cypher), {
        timeout: options.timeoutMs
      });
      return result.records.map((r) => toQueryRow(r.toObject()));
    },
    'runReadQuery'
  );
}

/**
 * Fetch annotations for many genes in one round trip.
 * Every requested id is present in the result, possibly with no annotations.
 */
export async function getGeneAnnotations(
  driver: Driver,
  database: string,
  geneIds: string[]
): Promise<Map<string, Annotation[]>> {
  const unique = [...new Set(geneIds)];
  const annotations = new Map<string, Annotation[]>(unique.map((id) => [id, []]));
  if (unique.length === 0) return annotations;

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.executeRead(async (tx) =>
        tx.run(GET_GENE_ANNOTATIONS, { geneIds: unique })
      );
      for (const record of result.records) {
        const geneId: unknown = record.get('geneId');
        const nodes: unknown = record.get('annotations');
        if (typeof geneId !== 'string' || !Array.isArray(nodes)) continue;
        annotations.set(
          geneId,
          nodes.filter((node): node is Node => isNode(node)).map((node) => recordToAnnotation(node))
        );
      }
      return annotations;
    },
    'getGeneAnnotations'
  );
}
