export { Searcher } from './searcher.js';
export type { CandidateSearch } from './searcher.js';
export { Reranker } from './reranker.js';
export { TeiRelevanceScorer, OllamaRelevanceScorer, parseScore } from './relevance-scorer.js';
export type { TeiScorerConfig, OllamaScorerConfig } from './relevance-scorer.js';
export {
  QueryExpander,
  extractEntities,
  preservesEntities,
  unionByBestSimilarity,
} from './query-expander.js';
export type { QueryExpanderConfig, QueryEntities } from './query-expander.js';
export { SanityChecker, checkText, plausibleValues, FACT_PATTERNS } from './sanity-checker.js';
export {
  buildEvidenceBundle,
  caveatsFor,
  resolveCaveats,
  reliabilityOf,
  mentionsFact,
  RULE_FACT_TYPE,
} from './evidence.js';
export type { EvidenceInput } from './evidence.js';
export { RAGPipeline, RERANK_FACTOR, factSchoolIds } from './rag-pipeline.js';
export type { RAGPipelineDeps, RAGRunOptions } from './rag-pipeline.js';
