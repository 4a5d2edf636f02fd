/**
 * Gene Identity Resolution
 *
 * Pathway entries and annotation rows describe the same gene with
 * different vocabularies. Both carry the gene symbol, so the symbol
 * is the merge key.
 */

import { MissingIdentifierError } from '../errors';

export interface GeneIdentifiers {
  names?: readonly string[];
  synonyms?: readonly string[];
}

const TRUNCATION_MARK = /\.{3}$/;

/**
 * Canonical form of a gene identifier: trimmed, without the trailing
 * "..." pathway graphics add to long labels, upper-cased.
 * Returns an empty string when nothing usable is left.
 */
export function normalizeIdentifier(value: string): string {
  return value.trim().replace(TRUNCATION_MARK, '').trim().toUpperCase();
}

/**
 * All normalized identifiers of a gene, synonyms before names,
 * without duplicates or empties.
 */
export function identifierSet(identifiers: GeneIdentifiers): string[] {
  const candidates = [...(identifiers.synonyms ?? []), ...(identifiers.names ?? [])];
  const normalized = new Set<string>();
  for (const candidate of candidates) {
    const key = normalizeIdentifier(candidate);
    if (key) normalized.add(key);
  }
  return [...normalized];
}

/**
 * Stable merge key for a gene. Same input, same key, on every import.
 *
 * @throws MissingIdentifierError when no synonym or name survives normalization
 */
export function resolveGeneKey(identifiers: GeneIdentifiers): string {
  const [key] = identifierSet(identifiers);
  if (key === undefined) {
    throw new MissingIdentifierError('Gene has no usable symbol, name or synonym');
  }
  return key;
}
