/**
 * Neo4j Graph Client
 *
 * Thin orchestrator that implements the GraphClient interface
 * by delegating to specialized operation modules.
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
  GraphClient,
  GraphCounts,
  InteractionInput,
  QueryRow,
  ReadQueryOptions,
  WriteCounters
} from '../types';
import { GraphClientError } from '../types';
import { withRetry } from './errors';
import {
  countEntities,
  getAnnotationsWithoutEmbedding,
  getGeneAnnotations,
  mergeAnnotationLinks,
  mergeAssociations,
  mergeInteractions,
  runReadQuery,
  setAnnotationEmbeddings,
  upsertAnnotations,
  upsertDiseases,
  upsertGenes
} from './operations';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Configuration for Neo4j connection.
 */
export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
}

// ============================================================
// CLIENT IMPLEMENTATION
// ============================================================

/**
 * Neo4j implementation of the GraphClient interface.
 *
 * All Cypher lives in the operation modules. The client manages the
 * driver lifecycle and hands the driver and database to each operation.
 */
export class Neo4jGraphClient implements GraphClient {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Get the Neo4j driver instance.
   * Throws if not connected.
   */
  get driver(): Driver {
    if (!this._driver) {
      throw new GraphClientError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return this._driver;
  }

  get database(): string {
    return this.config.database;
  }

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  async connect(): Promise<void> {
    this._driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    // Fail-fast: verify connectivity at startup
    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      throw new GraphClientError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'CONNECTION_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this._driver) {
      return false;
    }
    try {
      await this._driver.verifyConnectivity();
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================
  // SCHEMA MANAGEMENT
  // ============================================================

  async initializeSchema(): Promise<void> {
    await withRetry(async () => {
      const session = this.driver.session({ database: this.config.database });
      try {
        await initializeSchema(session);
      } finally {
        await session.close();
      }
    }, 'initializeSchema');
  }

  // ============================================================
  // IMPORT OPERATIONS
  // ============================================================

  async upsertDiseases(diseases: DiseaseInput[]): Promise<WriteCounters> {
    return upsertDiseases(this.driver, this.config.database, diseases);
  }

  async upsertGenes(genes: GeneInput[]): Promise<WriteCounters> {
    return upsertGenes(this.driver, this.config.database, genes);
  }

  async upsertAnnotations(annotations: AnnotationInput[]): Promise<WriteCounters> {
    return upsertAnnotations(this.driver, this.config.database, annotations);
  }

  async mergeInteractions(interactions: InteractionInput[]): Promise<WriteCounters> {
    return mergeInteractions(this.driver, this.config.database, interactions);
  }

  async mergeAssociations(associations: AssociationInput[]): Promise<WriteCounters> {
    return mergeAssociations(this.driver, this.config.database, associations);
  }

  async mergeAnnotationLinks(links: AnnotationLinkInput[]): Promise<WriteCounters> {
    return mergeAnnotationLinks(this.driver, this.config.database, links);
  }

  async getAnnotationsWithoutEmbedding(limit: number): Promise<Annotation[]> {
    return getAnnotationsWithoutEmbedding(this.driver, this.config.database, limit);
  }

  async setAnnotationEmbeddings(updates: AnnotationEmbeddingUpdate[]): Promise<void> {
    return setAnnotationEmbeddings(this.driver, this.config.database, updates);
  }

  async countEntities(): Promise<GraphCounts> {
    return countEntities(this.driver, this.config.database);
  }

  // ============================================================
  // READ OPERATIONS
  // ============================================================

  async runReadQuery(cypher: string, options?: ReadQueryOptions): Promise<QueryRow[]> {
    return runReadQuery(this.driver, this.config.database, cypher, options);
  }

  async getGeneAnnotations(geneIds: string[]): Promise<Map<string, Annotation[]>> {
    return getGeneAnnotations(this.driver, this.config.database, geneIds);
  }
}
