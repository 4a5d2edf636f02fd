/**
 * Neo4j Graph Provider
 *
 * The client is the only public surface; operations, queries and
 * mapping stay internal to this directory.
 */

export type { Neo4jConfig } from './client';
export { Neo4jGraphClient } from './client';
export { GRAPH_SCHEMA_DESCRIPTION } from './constants';
