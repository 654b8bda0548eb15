import { ok, err, type Result } from 'neverthrow';
import type { SearchCandidate, SearchFilters } from '../types/search.js';
import {
  EmbeddingError,
  type EmbeddingProvider,
  type SearchError,
  type VectorStore,
} from '../types/provider.js';

/** Anything that answers a filtered top-k query with ranked candidates. */
export interface CandidateSearch {
  search(
    queryText: string,
    filters?: SearchFilters,
    k?: number,
  ): Promise<Result<SearchCandidate[], SearchError>>;
}

/** Turns query text into a ranked candidate list through the embedding model and the store. */
export class Searcher implements CandidateSearch {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly store: VectorStore,
  ) {}

  async search(
    queryText: string,
    filters: SearchFilters = {},
    k = 5,
  ): Promise<Result<SearchCandidate[], SearchError>> {
    const query = queryText.trim();
    if (query.length === 0 || k <= 0) {
      return ok([]);
    }

    const embedded = await this.embedder.embed([query]);
    if (embedded.isErr()) {
      return err(embedded.error);
    }
    const [vector] = embedded.value;
    if (!vector || vector.length !== this.store.dimensions) {
      return err(
        new EmbeddingError(
          `Query embedding has ${vector?.length ?? 0} dimensions, store expects ${this.store.dimensions}`,
        ),
      );
    }

    const matches = await this.store.query(vector, k, filters);
    if (matches.isErr()) {
      return err(matches.error);
    }

    return ok(
      matches.value.map((match) => ({
        chunk: match.chunk,
        similarity: 1 - match.distance,
      })),
    );
  }
}
