import { ok, err, type Result } from 'neverthrow';
import { createHash } from 'node:crypto';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import { chunkId, type EmbeddedChunk, type PageType, type School, type SourcePage } from '../types/chunk.js';
import type { SearchFilters } from '../types/search.js';
import type {
  ChunkError,
  EmbeddingError,
  EmbeddingProvider,
  Logger,
  PageChunker,
  StoreUnavailableError,
  VectorStore,
} from '../types/provider.js';
import { inferPageType } from '../chunker/page-type.js';
import { errorMessage, silentLogger } from '../utils/logger.js';
import { SchoolRegistry } from './school-registry.js';

export class IngestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IngestError';
  }
}

/** Pages shorter than this after trimming carry no usable content. */
export const MIN_TEXT_LENGTH = 50;

export type SkipReason = 'not_text' | 'too_short' | 'unknown_school' | 'no_chunks';

export interface SkippedPage {
  url: string;
  reason: SkipReason;
}

export interface IngestReport {
  pages: number;
  schools: string[];
  skipped: SkippedPage[];
}

export interface EmbedReport {
  pages: number;
  chunks: number;
  skipped: SkippedPage[];
}

/** A community forum post as the forum crawler writes it. */
export interface CommunityPost {
  title?: string | null;
  content?: string | null;
  url?: string;
}

/**
 * One crawler output file with the file's stem as a school hint: official
 * pages as `{url: text}`, or a `<school>_reddit.json` list of forum posts.
 */
export type CrawlFile =
  | { kind: 'pages'; path: string; hint: string; documents: Record<string, unknown> }
  | { kind: 'community'; path: string; hint: string; posts: CommunityPost[] };

export type EmbedPagesError = StoreUnavailableError | EmbeddingError | ChunkError;

export interface IngestPipelineDeps {
  store: VectorStore;
  chunker: PageChunker;
  embedder: EmbeddingProvider;
  registry?: SchoolRegistry;
  logger?: Logger;
}

export interface EmbedOptions {
  filters?: SearchFilters;
  onProgress?: (done: number, total: number, url: string) => void;
}

/** A page as read from a crawl file; `pageType` overrides URL inference. */
interface PageEntry {
  url: string;
  raw: unknown;
  pageType?: PageType;
}

const crawlFileSchema = z.record(z.string(), z.unknown());

const communityFileSchema = z.array(
  z.object({
    title: z.string().nullish(),
    content: z.string().nullish(),
    url: z.string().optional(),
  }),
);

const COMMUNITY_SUFFIX = '_reddit';

/** `Title: ...` and `Content: ...` lines, the layout forum posts are embedded in. */
export function communityPostText(post: CommunityPost): string {
  return `Title: ${post.title ?? ''}\nContent: ${post.content ?? ''}`;
}

/** Stable page id: the first 16 hex digits of the URL's SHA-256. */
export function pageIdForUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16);
}

async function readCrawlFile(path: string): Promise<Result<CrawlFile, IngestError>> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    return err(new IngestError(`Failed to read ${path}: ${errorMessage(error)}`));
  }
  const stem = basename(path, extname(path));

  if (Array.isArray(data)) {
    const posts = communityFileSchema.safeParse(data);
    if (!posts.success) {
      return err(new IngestError(`${path} is not a list of {title, content} posts`));
    }
    const hint = stem.endsWith(COMMUNITY_SUFFIX) ? stem.slice(0, -COMMUNITY_SUFFIX.length) : stem;
    return ok({ kind: 'community', path, hint, posts: posts.data });
  }

  const parsed = crawlFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(new IngestError(`${path} is not a {url: text} object`));
  }
  return ok({ kind: 'pages', path, hint: stem, documents: parsed.data });
}

/** Reads one crawl file, or every `.json` file of a directory in name order. */
export async function loadCrawlDocuments(path: string): Promise<Result<CrawlFile[], IngestError>> {
  let paths: string[];
  try {
    const info = await stat(path);
    paths = info.isDirectory()
      ? (await readdir(path))
          .filter((name) => name.endsWith('.json'))
          .sort()
          .map((name) => join(path, name))
      : [path];
  } catch (error) {
    return err(new IngestError(`Cannot read ${path}: ${errorMessage(error)}`));
  }

  const files: CrawlFile[] = [];
  for (const filePath of paths) {
    const file = await readCrawlFile(filePath);
    if (file.isErr()) {
      return err(file.error);
    }
    files.push(file.value);
  }
  return ok(files);
}

/**
 * Offline path from crawler output to searchable chunks: pages are stored
 * first, then chunked and embedded page by page.
 */
export class IngestPipeline {
  private readonly store: VectorStore;
  private readonly chunker: PageChunker;
  private readonly embedder: EmbeddingProvider;
  private readonly registry: SchoolRegistry;
  private readonly logger: Logger;

  constructor(deps: IngestPipelineDeps) {
    this.store = deps.store;
    this.chunker = deps.chunker;
    this.embedder = deps.embedder;
    this.registry = deps.registry ?? new SchoolRegistry();
    this.logger = deps.logger ?? silentLogger;
  }

  async ingestFile(file: CrawlFile): Promise<Result<IngestReport, StoreUnavailableError>> {
    return file.kind === 'community'
      ? this.ingestCommunityPosts(file.posts, file.hint)
      : this.ingestDocuments(file.documents, file.hint);
  }

  async ingestDocuments(
    documents: Record<string, unknown>,
    filenameHint?: string,
  ): Promise<Result<IngestReport, StoreUnavailableError>> {
    return this.storePages(
      Object.entries(documents).map(([url, raw]) => ({ url, raw })),
      filenameHint,
    );
  }

  /**
   * Stores each forum post as a `reddit` page of the hinted school. Posts
   * without a permalink get a `reddit:<school>/<index>` address.
   */
  async ingestCommunityPosts(
    posts: readonly CommunityPost[],
    schoolHint: string,
  ): Promise<Result<IngestReport, StoreUnavailableError>> {
    return this.storePages(
      posts.map((post, i): PageEntry => ({
        url: post.url ?? `reddit:${schoolHint}/${i}`,
        raw: communityPostText(post),
        pageType: 'reddit',
      })),
      schoolHint,
    );
  }

  private async storePages(
    entries: readonly PageEntry[],
    filenameHint?: string,
  ): Promise<Result<IngestReport, StoreUnavailableError>> {
    const skipped: SkippedPage[] = [];
    const schools = new Map<string, School>();
    let pages = 0;

    for (const { url, raw, pageType } of entries) {
      if (typeof raw !== 'string') {
        skipped.push({ url, reason: 'not_text' });
        continue;
      }
      const text = raw.trim();
      if (text.length < MIN_TEXT_LENGTH) {
        this.logger.debug(`Skipping short page: ${url}`);
        skipped.push({ url, reason: 'too_short' });
        continue;
      }
      const school = this.registry.resolve(url, filenameHint);
      if (!school) {
        this.logger.debug(`Skipping page of unknown school: ${url}`);
        skipped.push({ url, reason: 'unknown_school' });
        continue;
      }

      const page: SourcePage = {
        id: pageIdForUrl(url),
        url,
        schoolId: school.id,
        pageType: pageType ?? inferPageType(url),
        rawText: text,
        charCount: text.length,
      };
      const stored = await this.store.upsertPage(page);
      if (stored.isErr()) {
        return err(stored.error);
      }
      schools.set(school.id, school);
      pages++;
    }

    const savedSchools = await this.store.upsertSchools([...schools.values()]);
    if (savedSchools.isErr()) {
      return err(savedSchools.error);
    }

    this.logger.info(`Stored ${pages} pages, skipped ${skipped.length}`);
    return ok({ pages, schools: [...schools.keys()], skipped });
  }

  /** Re-chunks and re-embeds stored pages, replacing each page's previous chunks. */
  async embedPages(options: EmbedOptions = {}): Promise<Result<EmbedReport, EmbedPagesError>> {
    const listed = await this.store.listPages(options.filters);
    if (listed.isErr()) {
      return err(listed.error);
    }

    const pages = listed.value;
    const skipped: SkippedPage[] = [];
    let embeddedPages = 0;
    let chunkCount = 0;

    for (const [i, page] of pages.entries()) {
      const spans = this.chunker.chunkAs(page.rawText, page.pageType);
      if (spans.isErr()) {
        return err(spans.error);
      }

      if (spans.value.length === 0) {
        const deleted = await this.store.deletePageChunks(page.id);
        if (deleted.isErr()) {
          return err(deleted.error);
        }
        skipped.push({ url: page.url, reason: 'no_chunks' });
        options.onProgress?.(i + 1, pages.length, page.url);
        continue;
      }

      const vectors = await this.embedder.embed(spans.value.map((span) => span.text));
      if (vectors.isErr()) {
        return err(vectors.error);
      }

      const chunks: EmbeddedChunk[] = spans.value.map((span, j) => ({
        id: chunkId(page.id, span.chunkIndex),
        pageId: page.id,
        chunkIndex: span.chunkIndex,
        schoolId: page.schoolId,
        sourceUrl: page.url,
        pageType: page.pageType,
        text: span.text,
        startOffset: span.startOffset,
        endOffset: span.endOffset,
        metadata: { school_id: page.schoolId, page_type: page.pageType, source_url: page.url },
        embedding: vectors.value[j] ?? [],
      }));

      // Old chunks go only once the replacements are embedded.
      const deleted = await this.store.deletePageChunks(page.id);
      if (deleted.isErr()) {
        return err(deleted.error);
      }
      const upserted = await this.store.upsert(chunks);
      if (upserted.isErr()) {
        return err(upserted.error);
      }

      this.logger.debug(`[${page.schoolId}][${page.pageType}] ${page.url} -> ${chunks.length} chunks`);
      embeddedPages++;
      chunkCount += chunks.length;
      options.onProgress?.(i + 1, pages.length, page.url);
    }

    return ok({ pages: embeddedPages, chunks: chunkCount, skipped });
  }
}
