/**
 * Catalog Module - Barrel Export
 */

export { TaskCatalog, buildFilterInfo } from './task-catalog';
export type { CatalogQueryOptions, SyncResult } from './task-catalog';
export { parseFilter, formatFilter, matchesFilter, NO_FILTER_TEXT } from './filter';
export { contentHash, canonicalJson } from './content-hash';
export { loadTaskDirectory, loadTaskFile, parseTaskFile } from './task-loader';
export type { LoadResult } from './task-loader';
export {
  exercisePayloadSchema,
  filterTagsSchema,
  hintSchema,
  taskFileSchema,
  taskFileEntrySchema,
} from './schemas';
export type { TaskFile, TaskFileEntry } from './schemas';
