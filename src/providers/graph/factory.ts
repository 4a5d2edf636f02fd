/**
 * Graph Client Factory
 *
 * The builder and the agent only see GraphClient; Neo4j is the one backend.
 */

import type { Config } from '@/config/schema';
import { Neo4jGraphClient } from './neo4j';
import type { GraphClient } from './types';

export function createGraphClient(config: Config['neo4j']): GraphClient {
  return new Neo4jGraphClient({
    uri: config.uri,
    user: config.user,
    password: config.password,
    database: config.database
  });
}
