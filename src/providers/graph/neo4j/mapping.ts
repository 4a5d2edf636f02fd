/**
 * Neo4j Record Mapping
 *
 * Translators that convert Neo4j records to TypeScript interfaces.
 * Centralizes all type coercion and null handling.
 */

import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isRelationship,
  isTime
} from 'neo4j-driver';
import type { Annotation, QueryRow } from '../types';
import { GraphClientError, isAspect } from '../types';

// ============================================================
// NODE TYPE DEFINITION
// ============================================================

/**
 * Shape of a Neo4j node as returned by the driver.
 */
export interface Neo4jNode {
  properties: Record<string, unknown>;
}

// ============================================================
// PROPERTY READERS
// ============================================================

function readString(props: Record<string, unknown>, key: string): string | null {
  const value = props[key];
  return typeof value === 'string' ? value : null;
}

function readStringList(props: Record<string, unknown>, key: string): string[] {
  const value: unknown = props[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function readEmbedding(props: Record<string, unknown>, key: string): number[] | null {
  const value: unknown = props[key];
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is number => typeof item === 'number');
}

/**
 * Driver integers are 64-bit; counts and sizes fit in a JS number.
 */
export function toNumber(value: unknown): number {
  if (isInt(value)) return value.toNumber();
  return typeof value === 'number' ? value : 0;
}

// ============================================================
// RECORD TRANSLATORS
// ============================================================

/**
 * Convert a Neo4j node to an Annotation.
 */
export function recordToAnnotation(node: Neo4jNode): Annotation {
  const props = node.properties;
  const goId = readString(props, 'go_id');
  const aspect = props['aspect'];
  if (goId === null || !isAspect(aspect)) {
    throw new GraphClientError(
      `Malformed Annotation node: go_id=${String(props['go_id'])} aspect=${String(aspect)}`,
      'QUERY_ERROR'
    );
  }
  return {
    go_id: goId,
    label: readString(props, 'label'),
    definition: readString(props, 'definition'),
    aspect,
    qualifiers: readStringList(props, 'qualifiers'),
    embedding: readEmbedding(props, 'embedding')
  };
}

// ============================================================
// GENERIC VALUES
// ============================================================

function plainProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const plain: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    // Embeddings are internal and would flood the answer prompt
    if (key === 'embedding') continue;
    plain[key] = toPlain(value);
  }
  return plain;
}

/**
 * Convert any driver value into plain JSON-friendly data.
 *
 * Integers become numbers (strings when outside the safe range),
 * temporal values their ISO strings, nodes and relationships their
 * properties, paths a list of segments.
 */
export function toPlain(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString();
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isTime(value) ||
    isLocalTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }
  if (isNode(value)) return plainProperties(value.properties);
  if (isRelationship(value)) return plainProperties(value.properties);
  if (isPath(value)) {
    return value.segments.map((segment) => ({
      start: plainProperties(segment.start.properties),
      relationship: {
        type: segment.relationship.type,
        ...plainProperties(segment.relationship.properties)
      },
      end: plainProperties(segment.end.properties)
    }));
  }
  if (Array.isArray(value)) return value.map((item: unknown) => toPlain(item));
  if (typeof value === 'object') {
    const plain: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      plain[key] = toPlain(item);
    }
    return plain;
  }
  return value;
}

/**
 * Convert a driver record's key/value object to a QueryRow.
 */
export function toQueryRow(entries: Record<string, unknown>): QueryRow {
  const row: QueryRow = {};
  for (const [key, value] of Object.entries(entries)) {
    row[key] = toPlain(value);
  }
  return row;
}
