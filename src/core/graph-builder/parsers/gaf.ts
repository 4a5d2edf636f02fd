/**
 * Annotation File Parser (GAF 2.x)
 *
 * Tab-separated, one annotation per line, `!` starts a comment.
 * Two optional trailing columns carry the GO term label and definition
 * when the file has been pre-joined with the ontology.
 */

import type { SkippedRecord, SourceDocument } from '../types';

export interface AnnotationRow {
  line: number;
  dbObjectId: string;
  symbol: string;
  qualifier: string | null;
  goId: string;
  evidenceCode: string | null;
  aspectCode: string;
  objectName: string | null;
  synonyms: string[];
  objectType: string | null;
  goLabel: string | null;
  goDefinition: string | null;
}

export interface ParsedAnnotations {
  rows: AnnotationRow[];
  skipped: SkippedRecord[];
}

/** DB through Assigned_By; extension and product form columns may be absent */
export const MANDATORY_COLUMNS = 15;

const COLUMN = {
  DB_OBJECT_ID: 1,
  SYMBOL: 2,
  QUALIFIER: 3,
  GO_ID: 4,
  EVIDENCE_CODE: 6,
  ASPECT: 8,
  OBJECT_NAME: 9,
  SYNONYMS: 10,
  OBJECT_TYPE: 11,
  GO_LABEL: 17,
  GO_DEFINITION: 18
} as const;

const GO_ID_PATTERN = /^GO:\d{7}$/;

function cell(columns: string[], index: number): string | null {
  const value = columns[index]?.trim();
  return value ? value : null;
}

/**
 * Parse a GAF document. Rows that cannot be read are returned as skipped
 * records instead of failing the whole file.
 */
export function parseGaf(source: SourceDocument): ParsedAnnotations {
  const rows: AnnotationRow[] = [];
  const skipped: SkippedRecord[] = [];
  const lines = source.content.split(/\r?\n/);

  lines.forEach((text, index) => {
    const line = index + 1;
    if (text.trim() === '' || text.startsWith('!')) return;

    const columns = text.split('\t');
    if (columns.length < MANDATORY_COLUMNS) {
      skipped.push({
        reason: 'ImportMalformedRecord',
        source: source.name,
        detail: `line ${line}: ${columns.length} columns, expected at least ${MANDATORY_COLUMNS}`
      });
      return;
    }

    const goId = cell(columns, COLUMN.GO_ID);
    if (!goId || !GO_ID_PATTERN.test(goId)) {
      skipped.push({
        reason: 'ImportMalformedRecord',
        source: source.name,
        detail: `line ${line}: missing or invalid GO id`
      });
      return;
    }

    const symbol = cell(columns, COLUMN.SYMBOL) ?? '';
    const synonyms = (cell(columns, COLUMN.SYNONYMS) ?? '')
      .split('|')
      .map((synonym) => synonym.trim())
      .filter((synonym) => synonym.length > 0);

    rows.push({
      line,
      dbObjectId: cell(columns, COLUMN.DB_OBJECT_ID) ?? '',
      symbol,
      qualifier: cell(columns, COLUMN.QUALIFIER),
      goId,
      evidenceCode: cell(columns, COLUMN.EVIDENCE_CODE),
      aspectCode: cell(columns, COLUMN.ASPECT) ?? '',
      objectName: cell(columns, COLUMN.OBJECT_NAME),
      synonyms,
      objectType: cell(columns, COLUMN.OBJECT_TYPE),
      goLabel: cell(columns, COLUMN.GO_LABEL),
      goDefinition: cell(columns, COLUMN.GO_DEFINITION)
    });
  });

  return { rows, skipped };
}
