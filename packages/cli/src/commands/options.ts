import { ok, err, type Result } from 'neverthrow';
import { PAGE_TYPES, type PageType, type SearchFilters } from '@studyrag/core';

export interface FilterOptions {
  school?: string;
  pageType?: string;
}

function isPageType(value: string): value is PageType {
  return PAGE_TYPES.some((type) => type === value);
}

export function parsePositiveInt(value: string, flag: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return err(`Invalid ${flag} value. Must be a positive integer.`);
  }
  return ok(parsed);
}

export function parseFilters(options: FilterOptions): Result<SearchFilters, string> {
  const filters: SearchFilters = {};
  if (options.school) {
    filters.schoolId = options.school.trim().toLowerCase();
  }
  if (options.pageType) {
    const pageType = options.pageType.trim().toLowerCase();
    if (!isPageType(pageType)) {
      return err(`Invalid --page-type value. Must be one of: ${PAGE_TYPES.join(', ')}.`);
    }
    filters.pageType = pageType;
  }
  return ok(filters);
}

export interface RetrievalSettings {
  filters: SearchFilters;
  /** Undefined leaves the configured default in place. */
  k?: number;
}

export function parseRetrievalOptions(options: FilterOptions & { topK?: string }): Result<RetrievalSettings, string> {
  const filters = parseFilters(options);
  if (filters.isErr()) {
    return err(filters.error);
  }
  if (options.topK === undefined) {
    return ok({ filters: filters.value });
  }
  const k = parsePositiveInt(options.topK, '--top-k');
  if (k.isErr()) {
    return err(k.error);
  }
  return ok({ filters: filters.value, k: k.value });
}
