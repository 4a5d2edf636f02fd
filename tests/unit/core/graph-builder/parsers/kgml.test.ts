/**
 * Pathway Map Parser Tests
 */

import { describe, expect, test } from 'vitest';
import { kgmlDocument, loadAlsFixture, loadPathwayFixtures } from '@tests/helpers/fixtures';
import { ImportMalformedRecordError } from '@/core/errors';
import { parseKgml, pathwayIdFromFileName } from '@/core/graph-builder/parsers/kgml';

describe('parseKgml', () => {
  describe('fixture maps', () => {
    test('reads map number, title and gene entries', async () => {
      const [parkinson] = await loadPathwayFixtures();
      if (!parkinson) throw new Error('fixture missing');

      const pathway = parseKgml(parkinson);

      expect(pathway.pathwayId).toBe('05012');
      expect(pathway.title).toBe('Parkinson disease');
      expect(pathway.genes.map((gene) => gene.entryId)).toEqual(['1', '2', '3', '5']);
      expect(pathway.genes[2]).toEqual({
        entryId: '3',
        keggIds: ['hsa:2770', 'hsa:2771'],
        symbols: ['GNAI1', 'GNAI']
      });
      expect(pathway.genes[3]?.symbols).toEqual([]);
    });

    test('drops the truncation mark from graphics labels', async () => {
      const pathway = parseKgml(await loadAlsFixture());

      expect(pathway.genes.map((gene) => gene.symbols)).toEqual([
        ['FUS', 'ALS6', 'TLS'],
        ['TARDBP', 'TDP-43']
      ]);
    });

    test('keeps gene-gene relations with their subtypes', async () => {
      const [parkinson] = await loadPathwayFixtures();
      if (!parkinson) throw new Error('fixture missing');

      const { relations } = parseKgml(parkinson);

      expect(relations).toEqual([
        { entry1: '1', entry2: '2', type: 'PPrel', subtypes: ['activation', 'binding'] },
        { entry1: '2', entry2: '3', type: 'GErel', subtypes: ['expression'] },
        { entry1: '3', entry2: '5', type: 'PPrel', subtypes: ['inhibition'] }
      ]);
    });

    test('reports compound relations and unknown types as skipped', async () => {
      const [parkinson] = await loadPathwayFixtures();
      if (!parkinson) throw new Error('fixture missing');

      const { skipped } = parseKgml(parkinson);

      expect(skipped).toEqual([
        { reason: 'NonGeneRelation', source: 'hsa05012.xml', detail: 'relation 1 -> 4 (PCrel)' },
        { reason: 'ImportMalformedRecord', source: 'hsa05012.xml', detail: 'relation 1 -> 3 (XYrel)' }
      ]);
    });

    test('takes the map number from the file name when the document has none', async () => {
      const [, alzheimer] = await loadPathwayFixtures();
      if (!alzheimer) throw new Error('fixture missing');

      const pathway = parseKgml(alzheimer);

      expect(pathway.pathwayId).toBe('05010');
      expect(pathway.title).toBe('Alzheimer disease');
    });
  });

  test('reads a single entry without a relation list', () => {
    const content = kgmlDocument(
      '<entry id="7" name="hsa:1" type="gene"><graphics name="ABC1, ABC"/></entry>'
    );

    const pathway = parseKgml({ name: 'single.xml', content });

    expect(pathway.genes).toEqual([{ entryId: '7', keggIds: ['hsa:1'], symbols: ['ABC1', 'ABC'] }]);
    expect(pathway.relations).toEqual([]);
  });

  test('ignores entries that are not genes', () => {
    const content = kgmlDocument(
      '<entry id="1" name="path:hsa04010" type="map"><graphics name="MAPK signaling pathway"/></entry>'
    );

    expect(parseKgml({ name: 'maps.xml', content }).genes).toEqual([]);
  });

  test('throws ImportMalformedRecordError for invalid XML', () => {
    expect(() => parseKgml({ name: 'broken.xml', content: '<pathway><entry></pathway>' })).toThrow(
      ImportMalformedRecordError
    );
  });

  test('throws ImportMalformedRecordError for a document that is not a pathway', () => {
    expect(() => parseKgml({ name: 'other.xml', content: '<?xml version="1.0"?><map/>' })).toThrow(
      'other.xml: not a KGML pathway document'
    );
  });

  test('throws when no map number can be found', () => {
    const content = kgmlDocument('', 'title="Untitled"');

    expect(() => parseKgml({ name: 'pathway.xml', content })).toThrow(
      'pathway.xml: pathway has no map number'
    );
  });
});

describe('pathwayIdFromFileName', () => {
  test('extracts the digits of the base name', () => {
    expect(pathwayIdFromFileName('data/KGML/hsa04930.xml')).toBe('04930');
  });

  test('returns null when the name has no digits', () => {
    expect(pathwayIdFromFileName('pathway.xml')).toBeNull();
  });
});
