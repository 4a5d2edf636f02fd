/**
 * Graph Client Types
 *
 * Defines the contract and data types for graph database providers.
 * The graph builder writes through this contract; the agent only reads.
 */

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * Standard error types that any graph implementation must map to.
 * This allows the core to handle errors consistently
 * regardless of the underlying database.
 */
export type GraphErrorType =
  | 'CONNECTION_ERROR' // Failed to connect to database
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'NOT_FOUND' // Node/edge not found
  | 'QUERY_ERROR' // Invalid query or execution error
  | 'TIMEOUT' // Query exceeded its deadline
  | 'TRANSIENT_ERROR'; // Temporary failure (retry possible)

/**
 * Standardized error class for graph operations.
 * All graph client implementations should throw this error type.
 */
export class GraphClientError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: GraphErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'GraphClientError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT_ERROR';
  }
}

// ============================================================
// DOMAIN CONSTANTS
// ============================================================

/**
 * GO aspects. The annotation source encodes them as single letters
 * (P, F, C); the aspect map translates the letter into one of these.
 */
export const ASPECTS = ['Biological Process', 'Molecular Function', 'Cellular Component'] as const;

export type Aspect = (typeof ASPECTS)[number];

export function isAspect(value: unknown): value is Aspect {
  return ASPECTS.some((aspect) => aspect === value);
}

/**
 * KGML relation types and their human-readable meaning.
 */
export const INTERACTION_TYPES = {
  ECrel: 'enzyme-enzyme relation, indicating two enzymes catalyzing successive reaction steps',
  PPrel: 'protein-protein interaction, such as binding and modification',
  GErel:
    'gene expression interaction, indicating relation of transcription factor and target gene product',
  PCrel: 'protein-compound interaction',
  maplink: 'link to another map'
} as const;

export type InteractionType = keyof typeof INTERACTION_TYPES;

export function isInteractionType(value: string): value is InteractionType {
  return Object.hasOwn(INTERACTION_TYPES, value);
}

// ============================================================
// NODE TYPES
// ============================================================

/**
 * Gene: merged from pathway entries and annotation rows.
 *
 * `names`, `synonyms` and `kegg_ids` are ordered sets that only grow.
 */
export interface Gene {
  id: string; // Merge key from the identity resolver, e.g. "PARK7"
  names: string[]; // "Parkinson disease protein 7"
  synonyms: string[]; // "PARK7", "DJ-1"
  kegg_ids: string[]; // "hsa:11315"
  object_type: string | null; // "protein"
}

/**
 * Disease: one per pathway map. The id is the map number ("05012").
 */
export interface Disease {
  disease_id: string;
  name: string;
}

/**
 * Annotation: a GO term attached to one or more genes.
 */
export interface Annotation {
  go_id: string; // "GO:0005515"
  label: string | null;
  definition: string | null;
  aspect: Aspect;
  qualifiers: string[]; // "enables", "involved_in", ...
  embedding: number[] | null;
}

// ============================================================
// IMPORT INPUT TYPES
// ============================================================

export interface DiseaseInput {
  diseaseId: string;
  name: string;
}

export interface GeneInput {
  id: string;
  names: string[];
  synonyms: string[];
  keggIds: string[];
  objectType: string | null;
}

export interface AnnotationInput {
  goId: string;
  label: string | null;
  definition: string | null;
  aspect: Aspect;
  qualifiers: string[];
}

/** INTERACTS_WITH, keyed by (sourceId, targetId, type) */
export interface InteractionInput {
  sourceId: string;
  targetId: string;
  type: InteractionType;
  subtypes: string[];
  pathwayId: string;
}

/** Evidence of a gene known only from pathway maps */
export const PATHWAY_EVIDENCE = 'KGML';

/** ASSOCIATED_WITH, keyed by (geneId, diseaseId) */
export interface AssociationInput {
  geneId: string;
  diseaseId: string;
  /** Sorted GO evidence codes joined by "|", or PATHWAY_EVIDENCE */
  evidence: string;
}

/** HAS_GO_ANNOTATION, keyed by (geneId, goId) */
export interface AnnotationLinkInput {
  geneId: string;
  goId: string;
}

export interface AnnotationEmbeddingUpdate {
  goId: string;
  embedding: number[];
}

// ============================================================
// RESULT TYPES
// ============================================================

/**
 * Store-side write counters for a single upsert batch.
 * Both stay at zero when every record already existed.
 */
export interface WriteCounters {
  nodesCreated: number;
  relationshipsCreated: number;
}

/**
 * Entity totals in the store.
 */
export interface GraphCounts {
  genes: number;
  diseases: number;
  annotations: number;
  interactions: number;
  associations: number;
  annotationLinks: number;
}

/**
 * One row of a read query, with driver values converted to plain JS.
 */
export type QueryRow = Record<string, unknown>;

export interface ReadQueryOptions {
  /** Server-side transaction timeout in milliseconds */
  timeoutMs?: number;
}

// ============================================================
// CLIENT INTERFACE
// ============================================================

/**
 * GraphClient Interface
 *
 * The persistence layer for the gene graph. Handles all database
 * operations but makes no decisions about what to store or how
 * to answer - that logic belongs in core.
 */
export interface GraphClient {
  /**
   * The database name.
   */
  readonly database: string;

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  /**
   * Establish connection to the database.
   * Verifies connectivity at startup (fail-fast).
   */
  connect(): Promise<void>;

  /**
   * Close all connections and release resources.
   */
  disconnect(): Promise<void>;

  /**
   * Check if the database is reachable and healthy.
   */
  healthCheck(): Promise<boolean>;

  /**
   * Create uniqueness constraints for the merge keys.
   * Safe to call multiple times (idempotent).
   */
  initializeSchema(): Promise<void>;

  // ============================================================
  // IMPORT (UPSERT) OPERATIONS
  // ============================================================

  upsertDiseases(diseases: DiseaseInput[]): Promise<WriteCounters>;

  /**
   * Find-or-create genes by id, then set-union names, synonyms and KEGG ids.
   */
  upsertGenes(genes: GeneInput[]): Promise<WriteCounters>;

  /**
   * Find-or-create annotations by GO id, then set-union qualifiers.
   */
  upsertAnnotations(annotations: AnnotationInput[]): Promise<WriteCounters>;

  /**
   * Merge INTERACTS_WITH edges by (source, target, type).
   * Subtypes and pathway ids accumulate on an existing edge.
   */
  mergeInteractions(interactions: InteractionInput[]): Promise<WriteCounters>;

  mergeAssociations(associations: AssociationInput[]): Promise<WriteCounters>;

  mergeAnnotationLinks(links: AnnotationLinkInput[]): Promise<WriteCounters>;

  /**
   * Annotations whose embedding has not been computed yet, ordered by GO id.
   */
  getAnnotationsWithoutEmbedding(limit: number): Promise<Annotation[]>;

  setAnnotationEmbeddings(updates: AnnotationEmbeddingUpdate[]): Promise<void>;

  countEntities(): Promise<GraphCounts>;

  // ============================================================
  // READ OPERATIONS
  // ============================================================

  /**
   * Run an arbitrary query in a read transaction.
   * Write clauses fail, which keeps the agent read-only.
   */
  runReadQuery(cypher: string, options?: ReadQueryOptions): Promise<QueryRow[]>;

  /**
   * HAS_GO_ANNOTATION targets for each gene id.
   * Genes without annotations map to an empty array.
   */
  getGeneAnnotations(geneIds: string[]): Promise<Map<string, Annotation[]>>;
}
