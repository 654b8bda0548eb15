export type {
  PageType,
  School,
  SourcePage,
  Chunk,
  ChunkMetadata,
  EmbeddedChunk,
  TextSpan,
  StudyRAGConfig,
  EmbeddingConfig,
  LLMConfig,
  ReRankerConfig,
  SearchConfig,
  ChunkBudget,
  ChunkingConfig,
  StorageConfig,
  FactsConfig,
  Logger,
  PageChunker,
  EmbeddingProvider,
  StoredMatch,
  VectorStore,
  RelevanceScorer,
  LLMProvider,
  SearchError,
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
} from './types/index.js';

export {
  PAGE_TYPES,
  chunkId,
  ChunkError,
  EmbeddingError,
  StoreUnavailableError,
  RerankUnavailableError,
  ExpansionFailureError,
  GenerationError,
} from './types/index.js';

// Config
export {
  loadConfig,
  parseConfig,
  serializeConfig,
  interpolateEnvVars,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-parser.js';

// Chunker
export {
  PageTypeChunker,
  splitQaUnits,
  inferPageType,
  PAGE_TYPE_RULES,
  PAGE_TYPE_AUTHORITY,
  DEFAULT_CHUNK_BUDGETS,
} from './chunker/index.js';
export type { PageTypeChunkerConfig } from './chunker/index.js';

// Embedding + storage
export {
  OllamaEmbeddingProvider,
  OpenAICompatibleEmbeddingProvider,
  LanceDBStore,
  InMemoryVectorStore,
  cosineDistance,
  checkVectors,
  splitIntoBatches,
} from './embedding/index.js';
export type { OllamaEmbeddingConfig, OpenAICompatibleEmbeddingConfig } from './embedding/index.js';

// Retrieval
export {
  Searcher,
  Reranker,
  TeiRelevanceScorer,
  OllamaRelevanceScorer,
  parseScore,
  QueryExpander,
  extractEntities,
  preservesEntities,
  unionByBestSimilarity,
  SanityChecker,
  checkText,
  plausibleValues,
  FACT_PATTERNS,
  buildEvidenceBundle,
  caveatsFor,
  resolveCaveats,
  reliabilityOf,
  mentionsFact,
  RULE_FACT_TYPE,
  RAGPipeline,
  RERANK_FACTOR,
  factSchoolIds,
} from './retrieval/index.js';
export type {
  CandidateSearch,
  TeiScorerConfig,
  OllamaScorerConfig,
  QueryExpanderConfig,
  QueryEntities,
  EvidenceInput,
  RAGPipelineDeps,
  RAGRunOptions,
} from './retrieval/index.js';

// Agent
export {
  ResearchAgent,
  decodeAction,
  describeAction,
  agentActionSchema,
  InvalidActionError,
  OllamaAgentController,
  buildMessages,
  toolCallToAction,
} from './agent/index.js';
export type {
  AgentContext,
  AgentController,
  AgentError,
  AgentRun,
  AgentStep,
  ResearchAgentDeps,
  ResearchAgentOptions,
  StepOrigin,
  TerminationReason,
  AgentAction,
  FinishAction,
  SearchAction,
  ChatModel,
  OllamaAgentControllerConfig,
} from './agent/index.js';

// Generation
export {
  OllamaClient,
  AnswerSynthesizer,
  buildAnswerPrompt,
  formatEvidenceForPrompt,
  formatFacts,
  formatPassage,
  formatPassages,
  LOW_RELIABILITY_BANNER,
  RagEvaluator,
  parseJudgement,
  contextRelevancePrompt,
  faithfulnessPrompt,
  answerRelevancePrompt,
} from './generation/index.js';
export type {
  OllamaConfig,
  ChatMessage,
  ChatReply,
  ToolCall,
  ToolDefinition,
  MetricScore,
  TriadEvaluation,
  TriadMetric,
} from './generation/index.js';

// Facts
export { FactsRepository, FactsError } from './facts/facts-repository.js';

// Ingestion
export {
  SchoolRegistry,
  DEFAULT_SCHOOLS,
  IngestPipeline,
  IngestError,
  MIN_TEXT_LENGTH,
  communityPostText,
  loadCrawlDocuments,
  pageIdForUrl,
} from './ingest/index.js';
export type {
  CommunityPost,
  CrawlFile,
  EmbedOptions,
  EmbedPagesError,
  EmbedReport,
  IngestPipelineDeps,
  IngestReport,
  SkipReason,
  SkippedPage,
} from './ingest/index.js';

// Runtime
export { createRuntime, RuntimeError } from './runtime.js';
export type { StudyRAGRuntime, RuntimeOptions } from './runtime.js';

// Utils
export { silentLogger, errorMessage } from './utils/logger.js';
