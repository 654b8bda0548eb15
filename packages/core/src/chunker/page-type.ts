import type { PageType } from '../types/chunk.js';
import type { ChunkBudget } from '../types/config.js';

interface PageTypeRule {
  type: PageType;
  matches: (url: string) => boolean;
}

function containsAny(...markers: string[]): (url: string) => boolean {
  return (url) => markers.some((marker) => url.includes(marker));
}

/**
 * Evaluated top to bottom against the lowercased URL; the first match wins and
 * anything unmatched is `general`.
 */
export const PAGE_TYPE_RULES: readonly PageTypeRule[] = [
  { type: 'faq', matches: containsAny('faq', 'frequently-asked') },
  { type: 'checklist', matches: containsAny('checklist', 'requirements') },
  { type: 'admissions', matches: containsAny('admissions', 'apply') },
  { type: 'reddit', matches: containsAny('reddit.com') },
];

export function inferPageType(url: string): PageType {
  const lowered = url.toLowerCase();
  const rule = PAGE_TYPE_RULES.find((candidate) => candidate.matches(lowered));
  return rule?.type ?? 'general';
}

function budget(size: number): ChunkBudget {
  return { size, overlap: Math.max(50, Math.floor(size * 0.1)) };
}

/** Character budgets per page type. FAQ answers run long, checklists are terse. */
export const DEFAULT_CHUNK_BUDGETS: Readonly<Record<PageType, ChunkBudget>> = {
  faq: budget(1200),
  checklist: budget(600),
  admissions: budget(800),
  reddit: budget(1500),
  general: budget(700),
};

/** Lower rank is more authoritative. */
export const PAGE_TYPE_AUTHORITY: Readonly<Record<PageType, number>> = {
  faq: 0,
  checklist: 1,
  admissions: 2,
  general: 3,
  reddit: 4,
};
