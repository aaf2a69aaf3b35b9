/**
 * Barrel export for the checklist loader.
 */

export { loadChecklist, parseChecklistXml } from './load-checklist.js';
export type { LoadOptions, LoadResult } from './load-checklist.js';
export { getSchemaVariant } from './schema-variants.js';
export type { SchemaVariant, ColumnSource } from './schema-variants.js';
