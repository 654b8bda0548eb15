export type {
  PageType,
  School,
  SourcePage,
  Chunk,
  ChunkMetadata,
  EmbeddedChunk,
  TextSpan,
} from './chunk.js';
export { PAGE_TYPES, chunkId } from './chunk.js';
export type {
  StudyRAGConfig,
  EmbeddingConfig,
  LLMConfig,
  ReRankerConfig,
  SearchConfig,
  ChunkBudget,
  ChunkingConfig,
  StorageConfig,
  FactsConfig,
} from './config.js';
export type {
  Logger,
  PageChunker,
  EmbeddingProvider,
  StoredMatch,
  VectorStore,
  RelevanceScorer,
  LLMProvider,
  SearchError,
} from './provider.js';
export {
  ChunkError,
  EmbeddingError,
  StoreUnavailableError,
  RerankUnavailableError,
  ExpansionFailureError,
  GenerationError,
} from './provider.js';
export type {
  SearchFilters,
  SearchCandidate,
  FactType,
  SanityRule,
  SanityFlag,
  AnnotatedCandidate,
  Reliability,
  Caveat,
  SchoolRequirements,
  SchoolDeadlines,
  SchoolFacts,
  EvidenceBundle,
} from './search.js';
