/**
 * Result Shape Tests
 */

import { describe, expect, test } from 'vitest';
import { checkResultShape, parseInteractionPaths } from '@/core/agent/facts';

const PRKN = { id: 'PRKN', names: ['E3 ubiquitin-protein ligase parkin'], synonyms: ['PRKN'] };
const SNCA = { id: 'SNCA', names: ['Alpha-synuclein'], synonyms: ['SNCA'] };

describe('parseInteractionPaths', () => {
  test('concatenates the paths of every row', () => {
    const rows = [
      { interactions: [[{ start: PRKN, end: SNCA, type: 'PPrel', subtypes: ['binding'] }]] },
      {
        interactions: [
          [{ start: SNCA, end: PRKN, type: 'GErel', subtypes: [] }],
          [{ start: PRKN, end: PRKN, type: 'PPrel', subtypes: ['activation'] }]
        ]
      }
    ];

    const paths = parseInteractionPaths(rows);

    expect(paths?.map((path) => path.map((edge) => edge.type))).toEqual([['PPrel'], ['GErel'], ['PPrel']]);
  });

  test('fills missing gene lists and null subtypes', () => {
    const rows = [{ interactions: [[{ start: { id: 'A' }, end: { id: 'B' }, type: 'PPrel', subtypes: null }]] }];

    expect(parseInteractionPaths(rows)).toEqual([
      [
        {
          start: { id: 'A', names: [], synonyms: [] },
          end: { id: 'B', names: [], synonyms: [] },
          type: 'PPrel',
          subtypes: []
        }
      ]
    ]);
  });

  test('returns null when a row lacks the column', () => {
    expect(parseInteractionPaths([{ interactions: [] }, { paths: [] }])).toBeNull();
  });

  test('returns null when the column does not hold edge lists', () => {
    expect(parseInteractionPaths([{ interactions: [{ start: PRKN }] }])).toBeNull();
  });
});

describe('checkResultShape', () => {
  test('no rows is an empty success for either category', () => {
    expect(checkResultShape('disease_association', [])).toEqual({ ok: true, empty: true });
    expect(checkResultShape('downstream_interaction', [])).toEqual({ ok: true, empty: true });
  });

  test('any association rows are facts', () => {
    expect(checkResultShape('disease_association', [{ disease_name: 'Parkinson disease' }])).toEqual({
      ok: true,
      empty: false
    });
  });

  test('downstream rows holding only empty paths are empty', () => {
    expect(checkResultShape('downstream_interaction', [{ interactions: [[], []] }])).toEqual({
      ok: true,
      empty: true
    });
  });

  test('downstream rows in another shape fail with a reason', () => {
    const check = checkResultShape('downstream_interaction', [{ gene: 'SNCA' }]);

    expect(check).toEqual({
      ok: false,
      reason: 'Expected a column named interactions holding one list of {start, end, type, subtypes} maps per path'
    });
  });
});
