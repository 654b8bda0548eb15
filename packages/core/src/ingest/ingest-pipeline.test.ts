import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ok, err } from 'neverthrow';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { IngestPipeline, communityPostText, loadCrawlDocuments, pageIdForUrl } from './ingest-pipeline.js';
import { InMemoryVectorStore } from '../embedding/memory-store.js';
import { PageTypeChunker } from '../chunker/page-chunker.js';
import { Searcher } from '../retrieval/searcher.js';
import { SanityChecker } from '../retrieval/sanity-checker.js';
import { EmbeddingError, StoreUnavailableError, type EmbeddingProvider } from '../types/provider.js';

const KEYWORDS = [/\btoefl\b/i, /\bgre\b/i, /\bgpa\b/i];

/** One dimension per keyword plus a constant, so unrelated texts stay comparable. */
function keywordEmbedder(): EmbeddingProvider {
  return {
    dimensions: KEYWORDS.length + 1,
    embed: vi.fn(async (texts: string[]) =>
      ok(texts.map((text) => [...KEYWORDS.map((keyword) => (keyword.test(text) ? 1 : 0)), 1])),
    ),
  };
}

const CHECKLIST_URL = 'https://www.cmu.edu/grad/application-checklist';
const CHECKLIST_TEXT =
  'Application checklist for the MS program. TOEFL minimum: 100. Submit transcripts and two letters.';
const ABOUT_URL = 'https://www.cmu.edu/grad/about';
const ABOUT_TEXT = 'The GRE is optional for all applicants to the graduate school this cycle.';

describe('pageIdForUrl', () => {
  it('should return 16 stable hex digits per URL', () => {
    const id = pageIdForUrl(CHECKLIST_URL);

    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(pageIdForUrl(CHECKLIST_URL)).toBe(id);
    expect(pageIdForUrl(ABOUT_URL)).not.toBe(id);
  });
});

describe('IngestPipeline', () => {
  let store: InMemoryVectorStore;
  let embedder: EmbeddingProvider;
  let pipeline: IngestPipeline;

  beforeEach(() => {
    store = new InMemoryVectorStore(KEYWORDS.length + 1);
    embedder = keywordEmbedder();
    pipeline = new IngestPipeline({ store, chunker: new PageTypeChunker(), embedder });
  });

  describe('ingestDocuments', () => {
    it('should store usable pages and report the rest as skipped', async () => {
      const report = (
        await pipeline.ingestDocuments({
          [CHECKLIST_URL]: `  ${CHECKLIST_TEXT}\n`,
          'https://www.cmu.edu/short': 'Too short to keep.',
          'https://example.com/blog/post': 'A long enough page that belongs to no school in the registry at all.',
          'https://www.cmu.edu/broken': 42,
        })
      )._unsafeUnwrap();

      expect(report.pages).toBe(1);
      expect(report.schools).toEqual(['cmu']);
      expect(report.skipped).toEqual([
        { url: 'https://www.cmu.edu/short', reason: 'too_short' },
        { url: 'https://example.com/blog/post', reason: 'unknown_school' },
        { url: 'https://www.cmu.edu/broken', reason: 'not_text' },
      ]);

      const pages = (await store.listPages())._unsafeUnwrap();
      expect(pages).toEqual([
        {
          id: pageIdForUrl(CHECKLIST_URL),
          url: CHECKLIST_URL,
          schoolId: 'cmu',
          pageType: 'checklist',
          rawText: CHECKLIST_TEXT,
          charCount: CHECKLIST_TEXT.length,
        },
      ]);
      expect((await store.listSchools())._unsafeUnwrap().map((school) => school.id)).toEqual(['cmu']);
    });

    it('should use the filename hint for hosts outside the registry', async () => {
      const url = 'https://www.reddit.com/r/csMajors/comments/abc';
      const report = (
        await pipeline.ingestDocuments(
          { [url]: 'Got into the MS program with a GPA of 3.7 and no research papers.' },
          'stanford',
        )
      )._unsafeUnwrap();

      expect(report.schools).toEqual(['stanford']);
      const [page] = (await store.listPages())._unsafeUnwrap();
      expect(page?.schoolId).toBe('stanford');
      expect(page?.pageType).toBe('reddit');
    });

    it('should stop at the first store failure', async () => {
      const failure = new StoreUnavailableError('disk full');
      vi.spyOn(store, 'upsertPage').mockResolvedValue(err(failure));

      const result = await pipeline.ingestDocuments({ [CHECKLIST_URL]: CHECKLIST_TEXT });

      expect(result._unsafeUnwrapErr()).toBe(failure);
      expect((await store.listSchools())._unsafeUnwrap()).toEqual([]);
    });
  });

  describe('ingestCommunityPosts', () => {
    const permalink = 'https://www.reddit.com/r/csMajors/comments/abc';
    const post = {
      title: 'Admitted to the MS in CS',
      content: 'GPA 3.8, TOEFL 108, two internships and one workshop paper.',
      url: permalink,
    };

    it('should store each post as a reddit page of the hinted school', async () => {
      const report = (await pipeline.ingestCommunityPosts([post], 'cmu'))._unsafeUnwrap();

      expect(report).toEqual({ pages: 1, schools: ['cmu'], skipped: [] });
      const text = `Title: ${post.title}\nContent: ${post.content}`;
      expect((await store.listPages())._unsafeUnwrap()).toEqual([
        {
          id: pageIdForUrl(permalink),
          url: permalink,
          schoolId: 'cmu',
          pageType: 'reddit',
          rawText: text,
          charCount: text.length,
        },
      ]);
    });

    it('should type posts as reddit even when the permalink names another page type', async () => {
      const url = 'https://www.reddit.com/r/gradadmissions/comments/def';

      await pipeline.ingestCommunityPosts([{ ...post, url }], 'cmu');

      const [page] = (await store.listPages())._unsafeUnwrap();
      expect(page?.pageType).toBe('reddit');
    });

    it('should address posts without a permalink by school and position', async () => {
      await pipeline.ingestCommunityPosts([{ title: post.title, content: post.content }], 'mit');

      const [page] = (await store.listPages())._unsafeUnwrap();
      expect(page?.url).toBe('reddit:mit/0');
      expect(page?.schoolId).toBe('mit');
    });

    it('should skip empty posts and unknown schools', async () => {
      const empty = (await pipeline.ingestCommunityPosts([{ title: null, content: '' }], 'cmu'))._unsafeUnwrap();
      const unknown = (await pipeline.ingestCommunityPosts([post], 'nowhere'))._unsafeUnwrap();

      expect(empty.skipped).toEqual([{ url: 'reddit:cmu/0', reason: 'too_short' }]);
      expect(unknown.skipped).toEqual([{ url: permalink, reason: 'unknown_school' }]);
    });

    it('should chunk stored posts with the reddit budget', async () => {
      // Longer than the admissions budget, within the reddit one.
      const long = {
        title: 'Profile review',
        content: 'Sharing my profile for the MS in CS. '.repeat(30),
        url: 'https://www.reddit.com/r/gradadmissions/comments/ghi',
      };
      await pipeline.ingestFile({ kind: 'community', path: 'cmu_reddit.json', hint: 'cmu', posts: [long] });

      const report = (await pipeline.embedPages())._unsafeUnwrap();

      expect(report.chunks).toBe(1);
      const [match] = (await store.query([0, 0, 0, 1], 1, { pageType: 'reddit' }))._unsafeUnwrap();
      expect(match?.chunk.text).toBe(communityPostText(long).trim());
      expect(match?.chunk.metadata).toEqual({ school_id: 'cmu', page_type: 'reddit', source_url: long.url });
    });
  });

  describe('embedPages', () => {
    beforeEach(async () => {
      await pipeline.ingestDocuments({ [CHECKLIST_URL]: CHECKLIST_TEXT, [ABOUT_URL]: ABOUT_TEXT });
    });

    it('should chunk and embed every stored page', async () => {
      const report = (await pipeline.embedPages())._unsafeUnwrap();

      expect(report).toEqual({ pages: 2, chunks: 2, skipped: [] });
      expect((await store.count())._unsafeUnwrap()).toBe(2);

      const [match] = (await store.query([1, 0, 0, 1], 1))._unsafeUnwrap();
      expect(match?.chunk).toEqual({
        id: `${pageIdForUrl(CHECKLIST_URL)}:0`,
        pageId: pageIdForUrl(CHECKLIST_URL),
        chunkIndex: 0,
        schoolId: 'cmu',
        sourceUrl: CHECKLIST_URL,
        pageType: 'checklist',
        text: CHECKLIST_TEXT,
        startOffset: 0,
        endOffset: CHECKLIST_TEXT.length,
        metadata: { school_id: 'cmu', page_type: 'checklist', source_url: CHECKLIST_URL },
      });
    });

    it('should replace a page\'s chunks when embedded again', async () => {
      await pipeline.embedPages();
      await pipeline.embedPages();

      expect((await store.count())._unsafeUnwrap()).toBe(2);
    });

    it('should only embed pages matching the filters', async () => {
      const report = (await pipeline.embedPages({ filters: { pageType: 'checklist' } }))._unsafeUnwrap();

      expect(report.pages).toBe(1);
      expect(embedder.embed).toHaveBeenCalledTimes(1);
      expect(embedder.embed).toHaveBeenCalledWith([CHECKLIST_TEXT]);
    });

    it('should report progress per page', async () => {
      const onProgress = vi.fn();

      await pipeline.embedPages({ onProgress });

      expect(onProgress.mock.calls).toEqual([
        [1, 2, CHECKLIST_URL],
        [2, 2, ABOUT_URL],
      ]);
    });

    it('should propagate embedding failures', async () => {
      const failing: EmbeddingProvider = {
        dimensions: 4,
        embed: vi.fn().mockResolvedValue(err(new EmbeddingError('model not loaded'))),
      };
      const broken = new IngestPipeline({ store, chunker: new PageTypeChunker(), embedder: failing });

      const result = await broken.embedPages();

      expect(result.isErr()).toBe(true);
      expect((await store.count())._unsafeUnwrap()).toBe(0);
    });

    it('should keep the previous chunks when re-embedding fails', async () => {
      await pipeline.embedPages();
      const failing: EmbeddingProvider = {
        dimensions: 4,
        embed: vi.fn().mockResolvedValue(err(new EmbeddingError('model not loaded'))),
      };
      const broken = new IngestPipeline({ store, chunker: new PageTypeChunker(), embedder: failing });

      const result = await broken.embedPages();

      expect(result._unsafeUnwrapErr().message).toBe('model not loaded');
      expect((await store.count())._unsafeUnwrap()).toBe(2);
    });
  });

  it('should make an ingested checklist figure searchable without flags', async () => {
    await pipeline.ingestDocuments({ [CHECKLIST_URL]: CHECKLIST_TEXT, [ABOUT_URL]: ABOUT_TEXT });
    await pipeline.embedPages();
    const searcher = new Searcher(embedder, store);

    const candidates = (await searcher.search('TOEFL requirement', { schoolId: 'cmu' }, 5))._unsafeUnwrap();
    const [top] = new SanityChecker().annotate(candidates);

    expect(candidates).toHaveLength(2);
    expect(top?.chunk.sourceUrl).toBe(CHECKLIST_URL);
    expect(top?.chunk.text).toContain('100');
    expect(top?.flags).toEqual([]);
  });
});

describe('loadCrawlDocuments', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawl-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should read every JSON file of a directory in name order', async () => {
    fs.writeFileSync(path.join(tmpDir, 'mit.json'), JSON.stringify({ 'https://mit.edu/a': 'text a' }));
    fs.writeFileSync(path.join(tmpDir, 'cmu.json'), JSON.stringify({ 'https://cmu.edu/b': 'text b' }));
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'ignored');

    const files = (await loadCrawlDocuments(tmpDir))._unsafeUnwrap();

    expect(files.map((file) => file.hint)).toEqual(['cmu', 'mit']);
    expect(files[0]).toEqual({
      kind: 'pages',
      path: path.join(tmpDir, 'cmu.json'),
      hint: 'cmu',
      documents: { 'https://cmu.edu/b': 'text b' },
    });
  });

  it('should read a single file', async () => {
    const file = path.join(tmpDir, 'stanford.json');
    fs.writeFileSync(file, JSON.stringify({ 'https://stanford.edu/x': 'text' }));

    const files = (await loadCrawlDocuments(file))._unsafeUnwrap();

    expect(files).toEqual([
      { kind: 'pages', path: file, hint: 'stanford', documents: { 'https://stanford.edu/x': 'text' } },
    ]);
  });

  it('should read a forum post list with the school taken from the file stem', async () => {
    const file = path.join(tmpDir, 'uiuc_reddit.json');
    const post = {
      title: 'Admit',
      url: 'https://www.reddit.com/r/csMajors/comments/xyz',
      author: 'someone',
      upvotes: 12,
      content: 'Got in.',
    };
    fs.writeFileSync(file, JSON.stringify([post]));

    const files = (await loadCrawlDocuments(file))._unsafeUnwrap();

    expect(files).toEqual([
      {
        kind: 'community',
        path: file,
        hint: 'uiuc',
        posts: [{ title: 'Admit', url: 'https://www.reddit.com/r/csMajors/comments/xyz', content: 'Got in.' }],
      },
    ]);
  });

  it('should reject a file that is not a url-to-text object', async () => {
    const file = path.join(tmpDir, 'count.json');
    fs.writeFileSync(file, JSON.stringify(42));

    const error = (await loadCrawlDocuments(file))._unsafeUnwrapErr();

    expect(error.name).toBe('IngestError');
    expect(error.message).toBe(`${file} is not a {url: text} object`);
  });

  it('should reject a list that does not hold posts', async () => {
    const file = path.join(tmpDir, 'list.json');
    fs.writeFileSync(file, JSON.stringify(['https://cmu.edu']));

    const error = (await loadCrawlDocuments(file))._unsafeUnwrapErr();

    expect(error.message).toBe(`${file} is not a list of {title, content} posts`);
  });

  it('should reject a missing path', async () => {
    const error = (await loadCrawlDocuments(path.join(tmpDir, 'missing')))._unsafeUnwrapErr();

    expect(error.message).toContain('Cannot read');
  });
});
