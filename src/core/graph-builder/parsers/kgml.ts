/**
 * Pathway Map Parser (KGML)
 *
 * Reads a KEGG pathway map into genes and gene-gene relations.
 * Compounds, groups, orthologs and map links to other pathways are
 * not genes; relations touching them are reported as skipped.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ImportMalformedRecordError } from '@/core/errors';
import { isInteractionType, type InteractionType } from '@/providers/graph/types';
import type { SkippedRecord, SourceDocument } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface PathwayGene {
  entryId: string;
  /** KEGG gene ids, e.g. "hsa:5071" */
  keggIds: string[];
  /** Display symbols from the map graphics, e.g. "PRKN", "PARK2" */
  symbols: string[];
}

export interface PathwayRelation {
  entry1: string;
  entry2: string;
  type: InteractionType;
  subtypes: string[];
}

export interface ParsedPathway {
  pathwayId: string;
  title: string;
  genes: PathwayGene[];
  relations: PathwayRelation[];
  skipped: SkippedRecord[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Document Schema
// ═══════════════════════════════════════════════════════════════════════════════

const ARRAY_ELEMENTS = new Set(['entry', 'relation', 'subtype', 'graphics']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  isArray: (tagName) => ARRAY_ELEMENTS.has(tagName)
});

const attribute = z.string().optional();

const EntrySchema = z.object({
  '@_id': attribute,
  '@_name': attribute,
  '@_type': attribute,
  graphics: z.array(z.object({ '@_name': attribute })).optional()
});

const RelationSchema = z.object({
  '@_entry1': attribute,
  '@_entry2': attribute,
  '@_type': attribute,
  subtype: z.array(z.object({ '@_name': attribute })).optional()
});

const DocumentSchema = z.object({
  pathway: z.object({
    '@_number': attribute,
    '@_title': attribute,
    entry: z.array(EntrySchema).default([]),
    relation: z.array(RelationSchema).default([])
  })
});

type Entry = z.infer<typeof EntrySchema>;
type Relation = z.infer<typeof RelationSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map number from the file name: "hsa05012.xml" -> "05012".
 */
export function pathwayIdFromFileName(name: string): string | null {
  const base = name.split(/[\\/]/).pop() ?? name;
  const match = /(\d+)/.exec(base);
  return match?.[1] ?? null;
}

/** Graphics labels end in "..." when KEGG truncates them */
function splitSymbols(graphicsName: string | undefined): string[] {
  if (!graphicsName) return [];
  return graphicsName
    .split(',')
    .map((symbol) => symbol.trim().replace(/\.{3}$/, '').trim())
    .filter((symbol) => symbol.length > 0);
}

function toGene(entry: Entry): PathwayGene | null {
  const entryId = entry['@_id'];
  if (!entryId) return null;
  return {
    entryId,
    keggIds: (entry['@_name'] ?? '').split(/\s+/).filter((id) => id.length > 0),
    symbols: splitSymbols(entry.graphics?.[0]?.['@_name'])
  };
}

function describeRelation(relation: Relation): string {
  return `relation ${relation['@_entry1'] ?? '?'} -> ${relation['@_entry2'] ?? '?'} (${relation['@_type'] ?? 'no type'})`;
}

/**
 * Parse one KGML document.
 *
 * @throws ImportMalformedRecordError when the document is not a pathway map
 *   or carries no map number in either the document or its file name
 */
export function parseKgml(source: SourceDocument): ParsedPathway {
  const validation = XMLValidator.validate(source.content);
  if (validation !== true) {
    throw new ImportMalformedRecordError(
      `invalid XML at line ${validation.err.line}: ${validation.err.msg}`,
      source.name
    );
  }

  const document = DocumentSchema.safeParse(parser.parse(source.content));
  if (!document.success) {
    throw new ImportMalformedRecordError('not a KGML pathway document', source.name);
  }
  const pathway = document.data.pathway;

  const pathwayId = pathway['@_number'] || pathwayIdFromFileName(source.name);
  if (!pathwayId) {
    throw new ImportMalformedRecordError('pathway has no map number', source.name);
  }

  const skipped: SkippedRecord[] = [];
  const genes: PathwayGene[] = [];
  const geneEntryIds = new Set<string>();

  for (const entry of pathway.entry) {
    if (entry['@_type'] !== 'gene') continue;
    const gene = toGene(entry);
    if (!gene) {
      skipped.push({
        reason: 'ImportMalformedRecord',
        source: source.name,
        detail: `gene entry without id (${entry['@_name'] ?? 'unnamed'})`
      });
      continue;
    }
    genes.push(gene);
    geneEntryIds.add(gene.entryId);
  }

  const relations: PathwayRelation[] = [];
  for (const relation of pathway.relation) {
    const entry1 = relation['@_entry1'];
    const entry2 = relation['@_entry2'];
    const type = relation['@_type'];

    if (!entry1 || !entry2 || !type || !isInteractionType(type)) {
      skipped.push({
        reason: 'ImportMalformedRecord',
        source: source.name,
        detail: describeRelation(relation)
      });
      continue;
    }
    if (!geneEntryIds.has(entry1) || !geneEntryIds.has(entry2)) {
      skipped.push({
        reason: 'NonGeneRelation',
        source: source.name,
        detail: describeRelation(relation)
      });
      continue;
    }

    relations.push({
      entry1,
      entry2,
      type,
      subtypes: (relation.subtype ?? [])
        .map((subtype) => subtype['@_name'])
        .filter((name): name is string => name !== undefined && name.length > 0)
    });
  }

  return {
    pathwayId,
    title: pathway['@_title'] ?? pathwayId,
    genes,
    relations,
    skipped
  };
}
