/** Page categories inferred from a crawled URL. Order follows the inference priority. */
export const PAGE_TYPES = ['faq', 'checklist', 'admissions', 'reddit', 'general'] as const;

export type PageType = (typeof PAGE_TYPES)[number];

export interface School {
  /** Short code, e.g. `cmu`. */
  id: string;
  name: string;
  domain?: string;
}

export interface SourcePage {
  /** Deterministic hash of the URL. */
  id: string;
  url: string;
  schoolId: string;
  pageType: PageType;
  rawText: string;
  charCount: number;
}

export interface ChunkMetadata {
  school_id: string;
  page_type: PageType;
  source_url: string;
  [key: string]: string | number | boolean;
}

/**
 * A bounded span of one source page. Identity is `(pageId, chunkIndex)`;
 * `id` is the string form `<pageId>:<chunkIndex>`.
 */
export interface Chunk {
  id: string;
  pageId: string;
  chunkIndex: number;
  schoolId: string;
  sourceUrl: string;
  pageType: PageType;
  text: string;
  /** Offset of the first character of `text` in the page text. */
  startOffset: number;
  /** Offset one past the last character of `text`. */
  endOffset: number;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk extends Chunk {
  embedding: number[];
}

/** A text span produced by the chunker, before it is attached to a page. */
export interface TextSpan {
  chunkIndex: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export function chunkId(pageId: string, chunkIndex: number): string {
  return `${pageId}:${chunkIndex}`;
}
