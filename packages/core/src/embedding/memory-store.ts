import { ok, type Result } from 'neverthrow';
import type { EmbeddedChunk, School, SourcePage } from '../types/chunk.js';
import type { SearchFilters } from '../types/search.js';
import type { StoreUnavailableError, StoredMatch, VectorStore } from '../types/provider.js';
import { cosineDistance } from './vectors.js';

interface StoredChunk {
  chunk: EmbeddedChunk;
  /** Position of the first write of this key; overwrites keep it. */
  sequence: number;
}

export function matchesFilters(
  value: { schoolId: string; pageType: string },
  filters?: SearchFilters,
): boolean {
  if (filters?.schoolId !== undefined && value.schoolId !== filters.schoolId) {
    return false;
  }
  if (filters?.pageType !== undefined && value.pageType !== filters.pageType) {
    return false;
  }
  return true;
}

/**
 * Exact cosine search over chunks held in memory. Suitable for small
 * corpora and for tests; nothing survives the process.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly chunks = new Map<string, StoredChunk>();
  private readonly pages = new Map<string, SourcePage>();
  private readonly schools = new Map<string, School>();
  private nextSequence = 0;

  constructor(readonly dimensions: number) {}

  async upsert(chunks: EmbeddedChunk[]): Promise<Result<void, StoreUnavailableError>> {
    for (const chunk of chunks) {
      const existing = this.chunks.get(chunk.id);
      this.chunks.set(chunk.id, {
        chunk: { ...chunk, embedding: [...chunk.embedding] },
        sequence: existing?.sequence ?? this.nextSequence++,
      });
    }
    return ok(undefined);
  }

  async query(
    embedding: number[],
    topK: number,
    filters?: SearchFilters,
  ): Promise<Result<StoredMatch[], StoreUnavailableError>> {
    if (topK <= 0) {
      return ok([]);
    }

    const scored = [...this.chunks.values()]
      .filter(({ chunk }) => matchesFilters(chunk, filters))
      .map(({ chunk, sequence }) => ({
        chunk,
        sequence,
        distance: cosineDistance(embedding, chunk.embedding),
      }));

    scored.sort((a, b) => a.distance - b.distance || a.sequence - b.sequence);

    return ok(
      scored.slice(0, topK).map(({ chunk, distance }) => {
        const { embedding: _embedding, ...plain } = chunk;
        return { chunk: plain, distance };
      }),
    );
  }

  async upsertPage(page: SourcePage): Promise<Result<void, StoreUnavailableError>> {
    this.pages.set(page.id, { ...page });
    return ok(undefined);
  }

  async listPages(filters?: SearchFilters): Promise<Result<SourcePage[], StoreUnavailableError>> {
    return ok([...this.pages.values()].filter((page) => matchesFilters(page, filters)));
  }

  async deletePageChunks(pageId: string): Promise<Result<void, StoreUnavailableError>> {
    for (const [id, stored] of this.chunks) {
      if (stored.chunk.pageId === pageId) {
        this.chunks.delete(id);
      }
    }
    return ok(undefined);
  }

  async upsertSchools(schools: School[]): Promise<Result<void, StoreUnavailableError>> {
    for (const school of schools) {
      this.schools.set(school.id, { ...school });
    }
    return ok(undefined);
  }

  async listSchools(): Promise<Result<School[], StoreUnavailableError>> {
    return ok([...this.schools.values()].sort((a, b) => a.id.localeCompare(b.id)));
  }

  async count(): Promise<Result<number, StoreUnavailableError>> {
    return ok(this.chunks.size);
  }

  close(): void {
    // Nothing to release.
  }
}
