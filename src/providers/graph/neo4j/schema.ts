/**
 * Neo4j Schema Management
 *
 * Creates the uniqueness constraints behind every merge key.
 * Designed for idempotent execution - safe to run multiple times.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS } from './queries';

// ============================================================
// SCHEMA INITIALIZATION
// ============================================================

/**
 * Initialize all database schema elements.
 * All operations are idempotent via IF NOT EXISTS clauses.
 */
export async function initializeSchema(session: Session): Promise<void> {
  await runSchemaOperation(session, CONSTRAINTS.GENE_ID);
  await runSchemaOperation(session, CONSTRAINTS.DISEASE_ID);
  await runSchemaOperation(session, CONSTRAINTS.ANNOTATION_ID);
}

/**
 * Run a single schema operation.
 *
 * Two importers starting together may race on the same constraint;
 * the loser sees "already exists" and the schema is in place anyway.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}
