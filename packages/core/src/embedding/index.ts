export { OllamaEmbeddingProvider } from './ollama-embedding-provider.js';
export type { OllamaEmbeddingConfig } from './ollama-embedding-provider.js';
export { OpenAICompatibleEmbeddingProvider } from './openai-compatible-embedding-provider.js';
export type { OpenAICompatibleEmbeddingConfig } from './openai-compatible-embedding-provider.js';
export { LanceDBStore } from './lancedb-store.js';
export { InMemoryVectorStore } from './memory-store.js';
export { cosineDistance, checkVectors, splitIntoBatches } from './vectors.js';
