/**
 * Result Shapes
 *
 * What a successful query must look like for its category, and when its
 * rows count as "nothing found".
 */

import type { QueryRow } from '@/providers/graph/types';
import { type Category, type InteractionEdge, InteractionsSchema } from './types';

export const INTERACTIONS_COLUMN = 'interactions';

export type ShapeCheck = { ok: true; empty: boolean } | { ok: false; reason: string };

/**
 * Paths from every row's `interactions` column, in row order.
 * Null when a row lacks the column or it does not hold edge lists.
 */
export function parseInteractionPaths(rows: readonly QueryRow[]): InteractionEdge[][] | null {
  const paths: InteractionEdge[][] = [];
  for (const row of rows) {
    if (!Object.hasOwn(row, INTERACTIONS_COLUMN)) return null;
    const parsed = InteractionsSchema.safeParse(row[INTERACTIONS_COLUMN]);
    if (!parsed.success) return null;
    paths.push(...parsed.data);
  }
  return paths;
}

export function checkResultShape(category: Category, rows: readonly QueryRow[]): ShapeCheck {
  if (rows.length === 0) return { ok: true, empty: true };

  switch (category) {
    case 'disease_association':
      return { ok: true, empty: false };
    case 'downstream_interaction': {
      const paths = parseInteractionPaths(rows);
      if (!paths) {
        return {
          ok: false,
          reason: `Expected a column named ${INTERACTIONS_COLUMN} holding one list of {start, end, type, subtypes} maps per path`
        };
      }
      return { ok: true, empty: paths.every((path) => path.length === 0) };
    }
  }
}
