import { ok, err, type Result } from 'neverthrow';
import type { PageType, TextSpan } from '../types/chunk.js';
import type { ChunkBudget } from '../types/config.js';
import { ChunkError, type PageChunker } from '../types/provider.js';
import { DEFAULT_CHUNK_BUDGETS, inferPageType } from './page-type.js';

export interface PageTypeChunkerConfig {
  budgets?: Partial<Record<PageType, ChunkBudget>>;
}

interface Region {
  start: number;
  end: number;
}

/**
 * Start of a question line: `Q:`, `Q1.`, `Question ...`, or any line that ends
 * with a question mark.
 */
const QUESTION_START = /^[ \t]*(?:Q[ \t]*\d*[ \t]*[:.)]|Question\b|[^\n]*\?[ \t]*$)/gim;

/**
 * Split text into contiguous question/answer units. Text before the first
 * question becomes its own unit.
 */
export function splitQaUnits(text: string): Region[] {
  const boundaries = new Set<number>([0]);
  for (const match of text.matchAll(QUESTION_START)) {
    boundaries.add(match.index ?? 0);
  }

  const starts = [...boundaries].sort((a, b) => a - b);
  return starts.map((start, i) => ({ start, end: starts[i + 1] ?? text.length }));
}

/** Greedily merge neighbouring units while the merged region fits the budget. */
function packUnits(units: Region[], size: number): Region[] {
  const packed: Region[] = [];
  let current: Region | undefined;

  for (const unit of units) {
    if (current && unit.end - current.start <= size) {
      current = { start: current.start, end: unit.end };
      continue;
    }
    if (current) packed.push(current);
    current = { ...unit };
  }
  if (current) packed.push(current);

  return packed;
}

function slidingWindows(region: Region, { size, overlap }: ChunkBudget): Region[] {
  const step = size - overlap;
  const windows: Region[] = [];
  for (let start = region.start; ; start += step) {
    const end = Math.min(start + size, region.end);
    windows.push({ start, end });
    if (end >= region.end) break;
  }
  return windows;
}

/**
 * Splits page text into overlapping windows sized by the page type inferred
 * from the URL. FAQ pages are first segmented into Q&A units so a question is
 * only ever separated from its answer when the pair alone exceeds the budget.
 */
export class PageTypeChunker implements PageChunker {
  private readonly budgets: Record<PageType, ChunkBudget>;

  constructor(config: PageTypeChunkerConfig = {}) {
    this.budgets = { ...DEFAULT_CHUNK_BUDGETS, ...config.budgets };
  }

  budgetFor(pageType: PageType): ChunkBudget {
    return this.budgets[pageType];
  }

  chunk(text: string, url: string): Result<TextSpan[], ChunkError> {
    return this.chunkAs(text, inferPageType(url));
  }

  chunkAs(text: string, pageType: PageType): Result<TextSpan[], ChunkError> {
    const budget = this.budgets[pageType];
    if (!Number.isInteger(budget.size) || budget.size <= 0) {
      return err(new ChunkError(`Invalid chunk size for ${pageType}: ${budget.size}`));
    }
    if (!Number.isInteger(budget.overlap) || budget.overlap < 0 || budget.overlap >= budget.size) {
      return err(
        new ChunkError(`Overlap for ${pageType} must be in [0, ${budget.size}), got ${budget.overlap}`),
      );
    }

    if (text.length === 0) {
      return ok([]);
    }

    const regions =
      pageType === 'faq'
        ? packUnits(splitQaUnits(text), budget.size)
        : [{ start: 0, end: text.length }];

    const spans: TextSpan[] = [];
    for (const region of regions) {
      for (const window of slidingWindows(region, budget)) {
        spans.push({
          chunkIndex: spans.length,
          text: text.slice(window.start, window.end),
          startOffset: window.start,
          endOffset: window.end,
        });
      }
    }

    return ok(spans);
  }
}
