/**
 * Graph Builder
 *
 * Merges pathway maps and a genome-wide annotation file into the graph.
 *
 * Flow:
 * 1. Parse every pathway map into genes and gene-gene relations
 * 2. Aggregate genes across maps by merge key, collecting pathway membership
 * 3. Join annotation rows onto pathway genes through an alias index
 * 4. Upsert nodes, then relationships, in UNWIND batches
 * 5. Optionally embed annotations that have no vector yet
 *
 * Every write is a MERGE, so an identical re-run creates nothing.
 */

import {
  type Aspect,
  type GraphClient,
  type InteractionType,
  PATHWAY_EVIDENCE,
  type WriteCounters
} from '@/providers/graph/types';
import { logImportResult, logImportStart, logPathwayParsed, logRecordSkipped } from '@/utils/logger';
import { ImportInProgressError, ImportMalformedRecordError, MissingIdentifierError } from '../errors';
import { embedAnnotations } from './embed-annotations';
import { identifierSet, normalizeIdentifier, resolveGeneKey } from './identity';
import { type ParsedPathway, parseGaf, parseKgml } from './parsers';
import {
  type AspectMap,
  type BuildOptions,
  type ImportReport,
  type SkipCounts,
  type SkippedRecord,
  type SourceDocument
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/** Records per UNWIND statement */
const WRITE_BATCH_SIZE = 500;

const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

// ═══════════════════════════════════════════════════════════════════════════════
// Import Guard
// ═══════════════════════════════════════════════════════════════════════════════

let importRunning = false;

/** Whether a build is running in this process */
export function isImportRunning(): boolean {
  return importRunning;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Aggregation State (one per build call)
// ═══════════════════════════════════════════════════════════════════════════════

interface GeneAggregate {
  id: string;
  names: Set<string>;
  synonyms: Set<string>;
  keggIds: Set<string>;
  objectType: string | null;
  evidence: Set<string>;
  pathways: Set<string>;
}

interface InteractionAggregate {
  sourceId: string;
  targetId: string;
  type: InteractionType;
  subtypes: Set<string>;
  pathwayId: string;
}

interface AnnotationAggregate {
  goId: string;
  label: string | null;
  definition: string | null;
  aspect: Aspect;
  qualifiers: Set<string>;
}

function emptySkipCounts(): SkipCounts {
  return { MissingIdentifier: 0, ImportMalformedRecord: 0, NonGeneRelation: 0 };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Builder
// ═══════════════════════════════════════════════════════════════════════════════

export class GraphBuilder {
  constructor(private readonly graphClient: GraphClient) {}

  /**
   * Merge the given sources into the graph.
   *
   * @throws ImportInProgressError when another build is running in this process
   */
  async build(
    pathwaySources: readonly SourceDocument[],
    annotationSource: SourceDocument | null,
    aspectMap: AspectMap,
    options: BuildOptions = {}
  ): Promise<ImportReport> {
    if (importRunning) {
      throw new ImportInProgressError();
    }
    importRunning = true;

    try {
      return await this.run(pathwaySources, annotationSource, aspectMap, options);
    } finally {
      importRunning = false;
    }
  }

  private async run(
    pathwaySources: readonly SourceDocument[],
    annotationSource: SourceDocument | null,
    aspectMap: AspectMap,
    options: BuildOptions
  ): Promise<ImportReport> {
    const startTime = Date.now();
    logImportStart(pathwaySources.length, annotationSource?.name ?? null);

    const skipCounts = emptySkipCounts();
    const skip = (record: SkippedRecord): void => {
      skipCounts[record.reason]++;
      logRecordSkipped(record);
    };

    await this.graphClient.initializeSchema();

    // ─────────────────────────────────────────────────────────────────────────
    // Pathway maps
    // ─────────────────────────────────────────────────────────────────────────

    const pathways: ParsedPathway[] = [];
    for (const source of pathwaySources) {
      try {
        const pathway = parseKgml(source);
        pathway.skipped.forEach(skip);
        pathways.push(pathway);
        logPathwayParsed(source.name, pathway.genes.length, pathway.relations.length);
      } catch (error) {
        if (!(error instanceof ImportMalformedRecordError)) throw error;
        skip({ reason: 'ImportMalformedRecord', source: source.name, detail: error.message });
      }
    }

    const diseases = new Map<string, string>();
    const genes = new Map<string, GeneAggregate>();
    const interactions = new Map<string, InteractionAggregate>();

    for (const pathway of pathways) {
      if (!diseases.has(pathway.pathwayId)) {
        diseases.set(pathway.pathwayId, pathway.title);
      }

      const keyByEntry = new Map<string, string>();
      for (const entry of pathway.genes) {
        let key: string;
        try {
          key = resolveGeneKey({ synonyms: entry.symbols });
        } catch (error) {
          if (!(error instanceof MissingIdentifierError)) throw error;
          skip({
            reason: 'MissingIdentifier',
            source: `pathway ${pathway.pathwayId}`,
            detail: `entry ${entry.entryId} (${entry.keggIds.join(' ') || 'no KEGG id'})`
          });
          continue;
        }
        keyByEntry.set(entry.entryId, key);

        const gene: GeneAggregate = genes.get(key) ?? {
          id: key,
          names: new Set<string>(),
          synonyms: new Set<string>(),
          keggIds: new Set<string>(),
          objectType: null,
          evidence: new Set<string>(),
          pathways: new Set<string>()
        };
        entry.symbols.forEach((symbol) => gene.synonyms.add(symbol));
        entry.keggIds.forEach((keggId) => gene.keggIds.add(keggId));
        gene.pathways.add(pathway.pathwayId);
        genes.set(key, gene);
      }

      for (const relation of pathway.relations) {
        const sourceId = keyByEntry.get(relation.entry1);
        const targetId = keyByEntry.get(relation.entry2);
        if (!sourceId || !targetId) {
          skip({
            reason: 'MissingIdentifier',
            source: `pathway ${pathway.pathwayId}`,
            detail: `relation ${relation.entry1} -> ${relation.entry2}: endpoint has no gene key`
          });
          continue;
        }

        const key = [sourceId, targetId, relation.type, pathway.pathwayId].join('\u0000');
        const interaction: InteractionAggregate = interactions.get(key) ?? {
          sourceId,
          targetId,
          type: relation.type,
          subtypes: new Set<string>(),
          pathwayId: pathway.pathwayId
        };
        relation.subtypes.forEach((subtype) => interaction.subtypes.add(subtype));
        interactions.set(key, interaction);
      }
    }

    // ─────────────────────────────────────────────────────────────────────────
    // Annotation file
    // ─────────────────────────────────────────────────────────────────────────

    // Own keys first so a gene's symbol never resolves to another gene
    const aliasIndex = new Map<string, string>();
    for (const key of genes.keys()) aliasIndex.set(key, key);
    for (const gene of genes.values()) {
      for (const alias of identifierSet({ synonyms: [...gene.synonyms] })) {
        if (!aliasIndex.has(alias)) aliasIndex.set(alias, gene.id);
      }
    }

    const annotations = new Map<string, AnnotationAggregate>();
    const annotationLinks = new Map<string, { geneId: string; goId: string }>();
    let unmatchedAnnotations = 0;

    if (annotationSource) {
      const parsed = parseGaf(annotationSource);
      parsed.skipped.forEach(skip);

      for (const row of parsed.rows) {
        const aspect = aspectMap[row.aspectCode];
        if (!aspect) {
          skip({
            reason: 'ImportMalformedRecord',
            source: annotationSource.name,
            detail: `line ${row.line}: aspect code "${row.aspectCode}" is not in the aspect map`
          });
          continue;
        }

        // The row's own symbol wins over its synonyms
        const candidates = identifierSet({ synonyms: [row.symbol, ...row.synonyms] });
        if (candidates.length === 0) {
          skip({
            reason: 'MissingIdentifier',
            source: annotationSource.name,
            detail: `line ${row.line}: no symbol or synonym`
          });
          continue;
        }

        const geneId = candidates.map((alias) => aliasIndex.get(alias)).find((id) => id !== undefined);
        const gene = geneId ? genes.get(geneId) : undefined;
        if (!gene) {
          unmatchedAnnotations++;
          continue;
        }

        if (row.objectName) gene.names.add(row.objectName);
        [row.symbol, ...row.synonyms]
          .filter((synonym) => normalizeIdentifier(synonym) !== '')
          .forEach((synonym) => gene.synonyms.add(synonym));
        gene.objectType ??= row.objectType;
        if (row.evidenceCode) gene.evidence.add(row.evidenceCode);

        const annotation: AnnotationAggregate = annotations.get(row.goId) ?? {
          goId: row.goId,
          label: null,
          definition: null,
          aspect,
          qualifiers: new Set<string>()
        };
        annotation.label ??= row.goLabel;
        annotation.definition ??= row.goDefinition;
        (row.qualifier ?? '')
          .split('|')
          .map((qualifier) => qualifier.trim())
          .filter((qualifier) => qualifier.length > 0)
          .forEach((qualifier) => annotation.qualifiers.add(qualifier));
        annotations.set(row.goId, annotation);

        annotationLinks.set(`${gene.id}\u0000${row.goId}`, { geneId: gene.id, goId: row.goId });
      }
    }

    // ─────────────────────────────────────────────────────────────────────────
    // Writes: nodes before the relationships that reference them
    // ─────────────────────────────────────────────────────────────────────────

    const diseaseInputs = [...diseases].map(([diseaseId, name]) => ({ diseaseId, name }));
    const geneInputs = [...genes.values()].map((gene) => ({
      id: gene.id,
      names: [...gene.names],
      synonyms: [...gene.synonyms],
      keggIds: [...gene.keggIds],
      objectType: gene.objectType
    }));
    const annotationInputs = [...annotations.values()].map((annotation) => ({
      goId: annotation.goId,
      label: annotation.label,
      definition: annotation.definition,
      aspect: annotation.aspect,
      qualifiers: [...annotation.qualifiers]
    }));
    const interactionInputs = [...interactions.values()].map((interaction) => ({
      sourceId: interaction.sourceId,
      targetId: interaction.targetId,
      type: interaction.type,
      subtypes: [...interaction.subtypes],
      pathwayId: interaction.pathwayId
    }));
    const associationInputs = [...genes.values()].flatMap((gene) => {
      const evidence = gene.evidence.size > 0 ? [...gene.evidence].sort().join('|') : PATHWAY_EVIDENCE;
      return [...gene.pathways].map((diseaseId) => ({ geneId: gene.id, diseaseId, evidence }));
    });
    const linkInputs = [...annotationLinks.values()];

    const counters: WriteCounters = { nodesCreated: 0, relationshipsCreated: 0 };
    const write = async <T>(
      items: readonly T[],
      upsert: (batch: T[]) => Promise<WriteCounters>
    ): Promise<void> => {
      for (const batch of chunk(items, WRITE_BATCH_SIZE)) {
        const result = await upsert(batch);
        counters.nodesCreated += result.nodesCreated;
        counters.relationshipsCreated += result.relationshipsCreated;
      }
    };

    await write(diseaseInputs, (batch) => this.graphClient.upsertDiseases(batch));
    await write(geneInputs, (batch) => this.graphClient.upsertGenes(batch));
    await write(annotationInputs, (batch) => this.graphClient.upsertAnnotations(batch));
    await write(interactionInputs, (batch) => this.graphClient.mergeInteractions(batch));
    await write(associationInputs, (batch) => this.graphClient.mergeAssociations(batch));
    await write(linkInputs, (batch) => this.graphClient.mergeAnnotationLinks(batch));

    const embeddedAnnotations = options.embeddingClient
      ? await embedAnnotations(
          this.graphClient,
          options.embeddingClient,
          options.embeddingBatchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE
        )
      : 0;

    const distinctInteractions = new Set(
      interactionInputs.map((i) => [i.sourceId, i.targetId, i.type].join('\u0000'))
    );

    const report: ImportReport = {
      pathways: pathways.length,
      genes: geneInputs.length,
      diseases: diseaseInputs.length,
      annotations: annotationInputs.length,
      interactions: distinctInteractions.size,
      associations: associationInputs.length,
      annotationLinks: linkInputs.length,
      unmatchedAnnotations,
      skipped: skipCounts,
      nodesCreated: counters.nodesCreated,
      relationshipsCreated: counters.relationshipsCreated,
      embeddedAnnotations,
      durationMs: Date.now() - startTime
    };

    logImportResult(report);
    return report;
  }
}
