export type { AnnotationRow, ParsedAnnotations } from './gaf';
export { MANDATORY_COLUMNS, parseGaf } from './gaf';
export type { ParsedPathway, PathwayGene, PathwayRelation } from './kgml';
export { parseKgml, pathwayIdFromFileName } from './kgml';
