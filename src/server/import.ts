/**
 * Configured Import
 *
 * Runs the graph builder over the files named in the config's import section.
 */

import { getConfig } from '@/config/config';
import { GraphBuilder, type ImportReport, readAnnotationSource, readPathwaySources } from '@/core';
import { getClients } from './clients';

export async function runConfiguredImport(): Promise<ImportReport> {
  const { import: importConfig } = getConfig();
  const { graphClient, embeddingClient } = await getClients();

  const pathwaySources = await readPathwaySources(importConfig.pathwayFiles);
  const annotationSource = importConfig.annotationFile
    ? await readAnnotationSource(importConfig.annotationFile)
    : null;

  return new GraphBuilder(graphClient).build(pathwaySources, annotationSource, importConfig.aspectMap, {
    embeddingClient,
    embeddingBatchSize: importConfig.embeddingBatchSize
  });
}
