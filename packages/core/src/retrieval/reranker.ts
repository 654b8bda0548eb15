import type { SearchCandidate } from '../types/search.js';
import type { Logger, RelevanceScorer } from '../types/provider.js';
import { silentLogger } from '../utils/logger.js';

/**
 * Reorders candidates by cross-encoder relevance. Never fails: when the
 * scorer is unavailable the input order is kept.
 */
export class Reranker {
  constructor(
    private readonly scorer: RelevanceScorer,
    private readonly logger: Logger = silentLogger,
  ) {}

  async rerank<T extends SearchCandidate>(query: string, candidates: T[], k: number): Promise<T[]> {
    if (candidates.length === 0 || k <= 0) {
      return [];
    }

    const scores = await this.scorer.score(
      query,
      candidates.map((candidate) => candidate.chunk.text),
    );
    if (scores.isErr()) {
      this.logger.warn(`Reranker unavailable, keeping search order: ${scores.error.message}`);
      return candidates.slice(0, k);
    }

    // Array.prototype.sort is stable: equal scores keep input order.
    const scored = candidates.map((candidate, i) => ({
      ...candidate,
      relevance: scores.value[i] ?? Number.NEGATIVE_INFINITY,
    }));
    scored.sort((a, b) => b.relevance - a.relevance);
    return scored.slice(0, k);
  }
}
