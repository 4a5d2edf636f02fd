/**
 * Source Loaders
 *
 * Read pathway maps and the annotation file from disk into SourceDocuments.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { SourceDocument } from './types';

export async function readSource(path: string): Promise<SourceDocument> {
  const content = await readFile(path, 'utf-8');
  return { name: basename(path), content };
}

export async function readPathwaySources(paths: readonly string[]): Promise<SourceDocument[]> {
  return Promise.all(paths.map((path) => readSource(path)));
}

export async function readAnnotationSource(path: string): Promise<SourceDocument> {
  return readSource(path);
}
