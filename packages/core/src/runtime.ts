import { ok, err, type Result } from 'neverthrow';
import { resolve, sep } from 'node:path';
import { loadConfig } from './config/config-parser.js';
import { OllamaEmbeddingProvider } from './embedding/ollama-embedding-provider.js';
import { OpenAICompatibleEmbeddingProvider } from './embedding/openai-compatible-embedding-provider.js';
import { LanceDBStore } from './embedding/lancedb-store.js';
import { PageTypeChunker } from './chunker/page-chunker.js';
import { Searcher } from './retrieval/searcher.js';
import { Reranker } from './retrieval/reranker.js';
import { OllamaRelevanceScorer, TeiRelevanceScorer } from './retrieval/relevance-scorer.js';
import { QueryExpander } from './retrieval/query-expander.js';
import { SanityChecker } from './retrieval/sanity-checker.js';
import { RAGPipeline } from './retrieval/rag-pipeline.js';
import { ResearchAgent } from './agent/agent.js';
import { OllamaAgentController } from './agent/ollama-controller.js';
import { OllamaClient } from './generation/ollama-client.js';
import { AnswerSynthesizer } from './generation/answer-synthesizer.js';
import { RagEvaluator } from './generation/rag-evaluator.js';
import { FactsRepository } from './facts/facts-repository.js';
import { IngestPipeline } from './ingest/ingest-pipeline.js';
import { SchoolRegistry, DEFAULT_SCHOOLS } from './ingest/school-registry.js';
import type { EmbeddingProvider, Logger, RelevanceScorer } from './types/provider.js';
import type { StudyRAGConfig } from './types/config.js';
import { silentLogger } from './utils/logger.js';

/** Every service a command needs, built from one configuration. */
export interface StudyRAGRuntime {
  readonly config: StudyRAGConfig;
  readonly store: LanceDBStore;
  readonly embedder: EmbeddingProvider;
  readonly registry: SchoolRegistry;
  readonly facts: FactsRepository | null;
  readonly searcher: Searcher;
  readonly reranker: Reranker | null;
  readonly pipeline: RAGPipeline;
  readonly agent: ResearchAgent;
  readonly synthesizer: AnswerSynthesizer;
  readonly evaluator: RagEvaluator;
  readonly ingest: IngestPipeline;
  /** Shut down the store connection. */
  close(): void;
}

export interface RuntimeOptions {
  /** Project root directory (must contain .studyrag.yaml). */
  rootDir: string;
  logger?: Logger;
  /** Set to false to skip the reranker even when the config enables it. */
  rerank?: boolean;
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

function createEmbeddingProvider(config: StudyRAGConfig): EmbeddingProvider {
  const { embedding } = config;
  const base = {
    model: embedding.model,
    dimensions: embedding.dimensions,
    ...(embedding.baseUrl ? { baseUrl: embedding.baseUrl } : {}),
  };

  if (embedding.provider === 'openai-compatible') {
    return new OpenAICompatibleEmbeddingProvider({
      ...base,
      ...(embedding.apiKey ? { apiKey: embedding.apiKey } : {}),
      ...(embedding.maxBatchSize ? { maxBatchSize: embedding.maxBatchSize } : {}),
    });
  }

  return new OllamaEmbeddingProvider({
    ...base,
    ...(embedding.maxBatchSize ? { batchSize: embedding.maxBatchSize } : {}),
  });
}

function createScorer(config: StudyRAGConfig): RelevanceScorer | null {
  const { reranker, llm } = config;
  if (!reranker?.enabled) {
    return null;
  }
  if (reranker.provider === 'tei') {
    return new TeiRelevanceScorer(reranker.baseUrl ? { baseUrl: reranker.baseUrl } : {});
  }
  const baseUrl = reranker.baseUrl ?? llm.baseUrl;
  return new OllamaRelevanceScorer({ model: reranker.model, ...(baseUrl ? { baseUrl } : {}) });
}

/**
 * Loads `.studyrag.yaml` under `rootDir` and wires the store, search,
 * reranking, expansion, agent, generation and ingestion services together.
 */
export async function createRuntime(
  options: RuntimeOptions,
): Promise<Result<StudyRAGRuntime, RuntimeError>> {
  const { rootDir, rerank = true } = options;
  const logger = options.logger ?? silentLogger;

  // --- Load config ---
  const configResult = await loadConfig(rootDir);
  if (configResult.isErr()) {
    return err(new RuntimeError(`Config load failed: ${configResult.error.message}`));
  }
  const config = configResult.value;

  // --- Resolve + validate storage path ---
  const root = resolve(rootDir);
  const storagePath = resolve(root, config.storage.path);
  if (storagePath !== root && !storagePath.startsWith(root + sep)) {
    return err(new RuntimeError('Storage path escapes project root'));
  }

  // --- Facts ---
  let facts: FactsRepository | null = null;
  if (config.facts) {
    const loaded = await FactsRepository.load(resolve(root, config.facts.path));
    if (loaded.isErr()) {
      return err(new RuntimeError(`Facts load failed: ${loaded.error.message}`));
    }
    facts = loaded.value;
  }

  // --- Connect LanceDB ---
  const store = new LanceDBStore(storagePath, config.embedding.dimensions);
  const connected = await store.connect();
  if (connected.isErr()) {
    return err(new RuntimeError(`LanceDB connection failed: ${connected.error.message}`));
  }

  const embedder = createEmbeddingProvider(config);
  const registry = new SchoolRegistry(config.schools ?? DEFAULT_SCHOOLS);
  const llm = new OllamaClient({
    model: config.llm.model,
    ...(config.llm.baseUrl ? { baseUrl: config.llm.baseUrl } : {}),
    ...(config.llm.timeout ? { timeout: config.llm.timeout } : {}),
  });

  const searcher = new Searcher(embedder, store);
  const scorer = rerank ? createScorer(config) : null;
  const reranker = scorer ? new Reranker(scorer, logger) : null;
  const sanityChecker = new SanityChecker();
  const expander = new QueryExpander(llm, searcher, {
    paraphrases: config.search.expansions,
    knownEntities: registry.entityNames(),
    logger,
  });

  const pipeline = new RAGPipeline(
    { searcher, reranker, expander, sanityChecker, facts, logger },
    { defaultK: config.search.topK, rerankFactor: config.search.rerankFactor },
  );

  const controller = new OllamaAgentController(llm, {
    schoolIds: registry.list().map((school) => school.id),
  });
  const agent = new ResearchAgent(
    { controller, searcher, reranker, sanityChecker, facts, logger },
    { maxSteps: config.search.maxSteps, k: config.search.topK, rerankFactor: config.search.rerankFactor },
  );

  const ingest = new IngestPipeline({
    store,
    chunker: new PageTypeChunker({ budgets: config.chunking.budgets }),
    embedder,
    registry,
    logger,
  });

  return ok({
    config,
    store,
    embedder,
    registry,
    facts,
    searcher,
    reranker,
    pipeline,
    agent,
    synthesizer: new AnswerSynthesizer(llm),
    evaluator: new RagEvaluator(llm),
    ingest,
    close: () => store.close(),
  });
}
