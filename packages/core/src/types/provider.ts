import type { Result } from 'neverthrow';
import type { Chunk, EmbeddedChunk, PageType, School, SourcePage, TextSpan } from './chunk.js';
import type { SearchFilters } from './search.js';

export class ChunkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkError';
  }
}

/** The embedding call failed or returned malformed vectors. */
export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/** Connection or query failure against the persistent store. Callers may retry. */
export class StoreUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

/** The relevance scorer could not be reached. Recovered by keeping search order. */
export class RerankUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RerankUnavailableError';
  }
}

/** Paraphrase generation failed. Recovered by searching the original query only. */
export class ExpansionFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpansionFailureError';
  }
}

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

/** Errors the search path hands back to its caller unchanged. */
export type SearchError = EmbeddingError | StoreUnavailableError;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface PageChunker {
  /** Chunks with the budget of the page type inferred from `url`. */
  chunk(text: string, url: string): Result<TextSpan[], ChunkError>;
  chunkAs(text: string, pageType: PageType): Result<TextSpan[], ChunkError>;
}

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<Result<number[][], EmbeddingError>>;
  readonly dimensions: number;
}

export interface StoredMatch {
  chunk: Chunk;
  /** Cosine distance between the stored embedding and the query, in [0, 2]. */
  distance: number;
}

export interface VectorStore {
  readonly dimensions: number;
  upsert(chunks: EmbeddedChunk[]): Promise<Result<void, StoreUnavailableError>>;
  query(
    embedding: number[],
    topK: number,
    filters?: SearchFilters,
  ): Promise<Result<StoredMatch[], StoreUnavailableError>>;
  upsertPage(page: SourcePage): Promise<Result<void, StoreUnavailableError>>;
  listPages(filters?: SearchFilters): Promise<Result<SourcePage[], StoreUnavailableError>>;
  /** Removes every chunk of a page ahead of re-ingestion. */
  deletePageChunks(pageId: string): Promise<Result<void, StoreUnavailableError>>;
  upsertSchools(schools: School[]): Promise<Result<void, StoreUnavailableError>>;
  listSchools(): Promise<Result<School[], StoreUnavailableError>>;
  count(): Promise<Result<number, StoreUnavailableError>>;
  close(): void;
}

/** Pairwise (query, passage) relevance, higher is more relevant. */
export interface RelevanceScorer {
  score(query: string, passages: string[]): Promise<Result<number[], RerankUnavailableError>>;
}

export interface LLMProvider {
  generate(prompt: string): Promise<Result<string, GenerationError>>;
}
