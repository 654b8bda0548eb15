import type { PageType, School } from './chunk.js';

export interface EmbeddingConfig {
  provider: 'ollama' | 'openai-compatible';
  model: string;
  dimensions: number;
  baseUrl?: string;
  apiKey?: string;
  maxBatchSize?: number;
}

export interface LLMConfig {
  provider: 'ollama';
  model: string;
  baseUrl?: string;
  timeout?: number;
}

export interface ReRankerConfig {
  enabled: boolean;
  provider: 'tei' | 'ollama';
  model: string;
  baseUrl?: string;
}

export interface SearchConfig {
  topK: number;
  /** Candidates fetched per result when a reranker is active. */
  rerankFactor: number;
  expansions: number;
  maxSteps: number;
}

export interface ChunkBudget {
  size: number;
  overlap: number;
}

export interface ChunkingConfig {
  budgets?: Partial<Record<PageType, ChunkBudget>>;
}

export interface StorageConfig {
  path: string;
}

export interface FactsConfig {
  path: string;
}

export interface StudyRAGConfig {
  version: string;
  embedding: EmbeddingConfig;
  llm: LLMConfig;
  reranker?: ReRankerConfig;
  search: SearchConfig;
  chunking: ChunkingConfig;
  storage: StorageConfig;
  schools?: School[];
  facts?: FactsConfig;
}
