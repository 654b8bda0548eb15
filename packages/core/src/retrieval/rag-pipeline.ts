import { ok, err, type Result } from 'neverthrow';
import type { EvidenceBundle, SearchCandidate, SearchFilters } from '../types/search.js';
import type { Logger, SearchError } from '../types/provider.js';
import type { FactsRepository } from '../facts/facts-repository.js';
import { silentLogger } from '../utils/logger.js';
import type { CandidateSearch } from './searcher.js';
import type { QueryExpander } from './query-expander.js';
import type { Reranker } from './reranker.js';
import { SanityChecker } from './sanity-checker.js';
import { buildEvidenceBundle } from './evidence.js';

export interface RAGPipelineDeps {
  searcher: CandidateSearch;
  reranker?: Reranker | null;
  expander?: QueryExpander | null;
  sanityChecker?: SanityChecker;
  facts?: FactsRepository | null;
  logger?: Logger;
}

export interface RAGRunOptions {
  filters?: SearchFilters;
  k?: number;
  /** Search paraphrases too. Ignored when no expander is configured. */
  expand?: boolean;
}

/** Candidates fetched per final result when a reranker will narrow them down. */
export const RERANK_FACTOR = 3;

/** Single search round: expand, search, rerank, sanity-check, bundle. */
export class RAGPipeline {
  private readonly searcher: CandidateSearch;
  private readonly reranker: Reranker | null;
  private readonly expander: QueryExpander | null;
  private readonly sanityChecker: SanityChecker;
  private readonly facts: FactsRepository | null;
  private readonly logger: Logger;
  private readonly defaultK: number;
  private readonly rerankFactor: number;

  constructor(deps: RAGPipelineDeps, options: { defaultK?: number; rerankFactor?: number } = {}) {
    this.searcher = deps.searcher;
    this.reranker = deps.reranker ?? null;
    this.expander = deps.expander ?? null;
    this.sanityChecker = deps.sanityChecker ?? new SanityChecker();
    this.facts = deps.facts ?? null;
    this.logger = deps.logger ?? silentLogger;
    this.defaultK = options.defaultK ?? 5;
    this.rerankFactor = options.rerankFactor ?? RERANK_FACTOR;
  }

  async run(query: string, options: RAGRunOptions = {}): Promise<Result<EvidenceBundle, SearchError>> {
    const filters = options.filters ?? {};
    const k = options.k ?? this.defaultK;
    const fetchK = this.reranker ? k * this.rerankFactor : k;

    const searched = await this.retrieve(query, filters, fetchK, options.expand === true);
    if (searched.isErr()) {
      return err(searched.error);
    }
    this.logger.debug(`Retrieved ${searched.value.length} candidates for "${query}"`);

    const ranked = this.reranker
      ? await this.reranker.rerank(query, searched.value, k)
      : searched.value.slice(0, k);

    const candidates = this.sanityChecker.annotate(ranked);
    const flagged = candidates.filter((c) => c.flags.length > 0).length;
    if (flagged > 0) {
      this.logger.warn(`${flagged} of ${candidates.length} passages carry implausible values`);
    }

    return ok(
      buildEvidenceBundle({
        query,
        candidates,
        facts: this.facts?.forSchools(factSchoolIds(filters, candidates)) ?? [],
      }),
    );
  }

  private async retrieve(
    query: string,
    filters: SearchFilters,
    k: number,
    expand: boolean,
  ): Promise<Result<SearchCandidate[], SearchError>> {
    if (expand && this.expander) {
      return this.expander.searchExpanded(query, filters, k);
    }
    return this.searcher.search(query, filters, k);
  }
}

/** The filtered school first, then schools in candidate order. */
export function factSchoolIds(filters: SearchFilters, candidates: readonly SearchCandidate[]): string[] {
  return [
    ...(filters.schoolId ? [filters.schoolId] : []),
    ...candidates.map((candidate) => candidate.chunk.schoolId),
  ];
}
