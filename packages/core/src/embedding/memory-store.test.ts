import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVectorStore } from './memory-store.js';
import type { EmbeddedChunk, PageType, SourcePage } from '../types/chunk.js';

function makeChunk(
  pageId: string,
  chunkIndex: number,
  embedding: number[],
  overrides: { schoolId?: string; pageType?: PageType; text?: string } = {},
): EmbeddedChunk {
  const schoolId = overrides.schoolId ?? 'cmu';
  const pageType = overrides.pageType ?? 'general';
  const sourceUrl = `https://example.edu/${pageId}`;
  return {
    id: `${pageId}:${chunkIndex}`,
    pageId,
    chunkIndex,
    schoolId,
    sourceUrl,
    pageType,
    text: overrides.text ?? `chunk ${chunkIndex} of ${pageId}`,
    startOffset: 0,
    endOffset: 10,
    metadata: { school_id: schoolId, page_type: pageType, source_url: sourceUrl },
    embedding,
  };
}

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(() => {
    store = new InMemoryVectorStore(3);
  });

  it('should return the nearest chunks first', async () => {
    await store.upsert([
      makeChunk('p1', 0, [1, 0, 0]),
      makeChunk('p1', 1, [0, 1, 0]),
      makeChunk('p1', 2, [0.9, 0.1, 0]),
    ]);

    const matches = (await store.query([1, 0, 0], 2))._unsafeUnwrap();

    expect(matches.map((m) => m.chunk.id)).toEqual(['p1:0', 'p1:2']);
    expect(matches[0]!.distance).toBeCloseTo(0);
  });

  it('should not return embeddings with matches', async () => {
    await store.upsert([makeChunk('p1', 0, [1, 0, 0])]);

    const [match] = (await store.query([1, 0, 0], 1))._unsafeUnwrap();

    expect(match).toBeDefined();
    expect('embedding' in match!.chunk).toBe(false);
  });

  it('should apply equality filters before ranking', async () => {
    await store.upsert([
      makeChunk('p1', 0, [1, 0, 0], { schoolId: 'cmu', pageType: 'faq' }),
      makeChunk('p2', 0, [1, 0, 0], { schoolId: 'mit', pageType: 'faq' }),
      makeChunk('p3', 0, [0, 1, 0], { schoolId: 'mit', pageType: 'general' }),
    ]);

    const bySchool = (await store.query([1, 0, 0], 5, { schoolId: 'mit' }))._unsafeUnwrap();
    const both = (
      await store.query([1, 0, 0], 5, { schoolId: 'mit', pageType: 'general' })
    )._unsafeUnwrap();

    expect(bySchool.map((m) => m.chunk.id)).toEqual(['p2:0', 'p3:0']);
    expect(both.map((m) => m.chunk.id)).toEqual(['p3:0']);
  });

  it('should break distance ties by insertion order', async () => {
    await store.upsert([makeChunk('b', 0, [0, 1, 0])]);
    await store.upsert([makeChunk('a', 0, [0, 1, 0])]);

    const matches = (await store.query([0, 1, 0], 2))._unsafeUnwrap();

    expect(matches.map((m) => m.chunk.id)).toEqual(['b:0', 'a:0']);
  });

  it('should overwrite by chunk key and keep the first insertion position', async () => {
    await store.upsert([makeChunk('b', 0, [0, 1, 0]), makeChunk('a', 0, [0, 1, 0])]);
    await store.upsert([makeChunk('b', 0, [0, 1, 0], { text: 'rewritten' })]);

    const matches = (await store.query([0, 1, 0], 2))._unsafeUnwrap();

    expect((await store.count())._unsafeUnwrap()).toBe(2);
    expect(matches.map((m) => m.chunk.text)).toEqual(['rewritten', 'chunk 0 of a']);
  });

  it('should return at most k results and nothing for k = 0', async () => {
    await store.upsert([makeChunk('p', 0, [1, 0, 0]), makeChunk('p', 1, [1, 1, 0])]);

    expect((await store.query([1, 0, 0], 1))._unsafeUnwrap()).toHaveLength(1);
    expect((await store.query([1, 0, 0], 0))._unsafeUnwrap()).toEqual([]);
  });

  it('should delete every chunk of a page', async () => {
    await store.upsert([
      makeChunk('p1', 0, [1, 0, 0]),
      makeChunk('p1', 1, [1, 0, 0]),
      makeChunk('p2', 0, [1, 0, 0]),
    ]);

    await store.deletePageChunks('p1');

    const matches = (await store.query([1, 0, 0], 10))._unsafeUnwrap();
    expect(matches.map((m) => m.chunk.id)).toEqual(['p2:0']);
  });

  it('should store pages and filter them', async () => {
    const page = (id: string, schoolId: string, pageType: PageType): SourcePage => ({
      id,
      url: `https://example.edu/${id}`,
      schoolId,
      pageType,
      rawText: 'text',
      charCount: 4,
    });
    await store.upsertPage(page('p1', 'cmu', 'faq'));
    await store.upsertPage(page('p2', 'mit', 'faq'));
    await store.upsertPage({ ...page('p1', 'cmu', 'faq'), rawText: 'updated', charCount: 7 });

    const all = (await store.listPages())._unsafeUnwrap();
    const mit = (await store.listPages({ schoolId: 'mit' }))._unsafeUnwrap();

    expect(all).toHaveLength(2);
    expect(all.find((p) => p.id === 'p1')?.rawText).toBe('updated');
    expect(mit.map((p) => p.id)).toEqual(['p2']);
  });

  it('should list schools sorted by id', async () => {
    await store.upsertSchools([
      { id: 'mit', name: 'MIT', domain: 'mit.edu' },
      { id: 'cmu', name: 'Carnegie Mellon University' },
    ]);

    const schools = (await store.listSchools())._unsafeUnwrap();

    expect(schools.map((s) => s.id)).toEqual(['cmu', 'mit']);
  });
});
