/**
 * Annotation File Parser Tests
 */

import { describe, expect, test } from 'vitest';
import { gafLine, loadAnnotationFixture } from '@tests/helpers/fixtures';
import { parseGaf } from '@/core/graph-builder/parsers/gaf';

describe('parseGaf', () => {
  test('skips comment and blank lines', async () => {
    const { rows } = parseGaf(await loadAnnotationFixture());

    expect(rows.map((row) => row.line)).toEqual([3, 4, 5, 6, 7, 10]);
  });

  test('reads every column of a full row', async () => {
    const { rows } = parseGaf(await loadAnnotationFixture());

    expect(rows[0]).toEqual({
      line: 3,
      dbObjectId: 'O60260',
      symbol: 'PRKN',
      qualifier: 'enables',
      goId: 'GO:0061630',
      evidenceCode: 'IDA',
      aspectCode: 'F',
      objectName: 'E3 ubiquitin-protein ligase parkin',
      synonyms: ['PARK2', 'PRKN'],
      objectType: 'protein',
      goLabel: 'ubiquitin protein ligase activity',
      goDefinition: 'Catalysis of the transfer of ubiquitin to a substrate protein.'
    });
  });

  test('leaves label and definition null when the file carries no ontology columns', async () => {
    const { rows } = parseGaf(await loadAnnotationFixture());
    const apoe = rows.find((row) => row.symbol === 'APOEX');

    expect(apoe?.goLabel).toBeNull();
    expect(apoe?.goDefinition).toBeNull();
  });

  test('reports short rows and bad GO ids as skipped', async () => {
    const { skipped } = parseGaf(await loadAnnotationFixture());

    expect(skipped).toEqual([
      {
        reason: 'ImportMalformedRecord',
        source: 'annotations.gaf',
        detail: 'line 8: 3 columns, expected at least 15'
      },
      {
        reason: 'ImportMalformedRecord',
        source: 'annotations.gaf',
        detail: 'line 9: missing or invalid GO id'
      }
    ]);
  });

  test('accepts CRLF line endings and empty synonym columns', () => {
    const line = gafLine(['UniProtKB', 'P1', 'ABC1', '', 'GO:0000002', 'PMID:1', 'IEA', '', 'C', '', '', '']);
    const { rows, skipped } = parseGaf({ name: 'crlf.gaf', content: `!gaf-version: 2.2\r\n${line}\r\n` });

    expect(skipped).toEqual([]);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      line: 2,
      symbol: 'ABC1',
      qualifier: null,
      aspectCode: 'C',
      objectName: null,
      synonyms: [],
      objectType: null
    });
  });
});
