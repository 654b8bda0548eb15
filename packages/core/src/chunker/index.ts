export type { PageTypeChunkerConfig } from './page-chunker.js';
export { PageTypeChunker, splitQaUnits } from './page-chunker.js';
export {
  PAGE_TYPE_RULES,
  PAGE_TYPE_AUTHORITY,
  DEFAULT_CHUNK_BUDGETS,
  inferPageType,
} from './page-type.js';
