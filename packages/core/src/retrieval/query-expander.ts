import { ok, err, type Result } from 'neverthrow';
import type { SearchCandidate, SearchFilters } from '../types/search.js';
import {
  ExpansionFailureError,
  type LLMProvider,
  type Logger,
  type SearchError,
} from '../types/provider.js';
import { silentLogger } from '../utils/logger.js';
import type { CandidateSearch } from './searcher.js';

export interface QueryExpanderConfig {
  /** Paraphrases requested per query. */
  paraphrases?: number;
  /** School names and ids that must survive paraphrasing when the query mentions them. */
  knownEntities?: string[];
  logger?: Logger;
}

const ACRONYM = /\b[A-Z][A-Z0-9]*[A-Z][A-Za-z0-9]*\b/g;
const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)]|\(\d+\))\s*/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, word: string, caseSensitive: boolean): boolean {
  return new RegExp(`(?<![\\w])${escapeRegExp(word)}(?![\\w])`, caseSensitive ? '' : 'i').test(text);
}

export interface QueryEntities {
  /** Upper-case tokens such as `UIUC`, `MSCS`, `TOEFL`; matched case-sensitively. */
  acronyms: string[];
  /** Known school names or ids found in the query; matched ignoring case. */
  names: string[];
}

export function extractEntities(query: string, knownEntities: readonly string[] = []): QueryEntities {
  const acronyms = [...new Set(query.match(ACRONYM) ?? [])];
  const names = knownEntities.filter(
    (entity) => entity.length > 0 && !acronyms.includes(entity) && containsWord(query, entity, false),
  );
  return { acronyms, names };
}

export function preservesEntities(paraphrase: string, entities: QueryEntities): boolean {
  return (
    entities.acronyms.every((acronym) => containsWord(paraphrase, acronym, true)) &&
    entities.names.every((name) => containsWord(paraphrase, name, false))
  );
}

function buildExpansionPrompt(query: string, n: number, entities: QueryEntities): string {
  const keep = [...entities.acronyms, ...entities.names];
  return [
    'You rewrite search queries for a graduate admissions knowledge base.',
    `Original query: "${query}"`,
    `Write ${n} search queries that ask for the same information in different words,`,
    'for example using both full names and abbreviations.',
    ...(keep.length > 0 ? [`Keep these terms exactly as written: ${keep.join(', ')}.`] : []),
    'Output one query per line, with no numbering and no preamble.',
  ].join('\n');
}

/**
 * Union of several ranked lists by chunk id, keeping each chunk's best
 * similarity. Sorted by similarity descending, then chunk id, so the
 * result does not depend on the order of the input lists.
 */
export function unionByBestSimilarity(lists: SearchCandidate[][]): SearchCandidate[] {
  const best = new Map<string, SearchCandidate>();
  for (const list of lists) {
    for (const candidate of list) {
      const current = best.get(candidate.chunk.id);
      if (!current || candidate.similarity > current.similarity) {
        best.set(candidate.chunk.id, candidate);
      }
    }
  }
  return [...best.values()].sort(
    (a, b) =>
      b.similarity - a.similarity ||
      (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0),
  );
}

export class QueryExpander {
  private readonly paraphrases: number;
  private readonly knownEntities: string[];
  private readonly logger: Logger;

  constructor(
    private readonly generator: LLMProvider,
    private readonly searcher: CandidateSearch,
    config: QueryExpanderConfig = {},
  ) {
    this.paraphrases = config.paraphrases ?? 3;
    this.knownEntities = config.knownEntities ?? [];
    this.logger = config.logger ?? silentLogger;
  }

  /** Paraphrases only, cleaned and entity-checked. */
  async paraphrase(query: string): Promise<Result<string[], ExpansionFailureError>> {
    const entities = extractEntities(query, this.knownEntities);
    const generated = await this.generator.generate(
      buildExpansionPrompt(query, this.paraphrases, entities),
    );
    if (generated.isErr()) {
      return err(new ExpansionFailureError(`Paraphrase generation failed: ${generated.error.message}`));
    }

    const seen = new Set([query.trim().toLowerCase()]);
    const paraphrases: string[] = [];
    for (const line of generated.value.split('\n')) {
      const cleaned = line.replace(LIST_MARKER, '').trim().replace(/^["']|["']$/g, '').trim();
      const key = cleaned.toLowerCase();
      if (cleaned.length === 0 || seen.has(key)) {
        continue;
      }
      if (!preservesEntities(cleaned, entities)) {
        this.logger.debug(`Dropping paraphrase that loses an entity: ${cleaned}`);
        continue;
      }
      seen.add(key);
      paraphrases.push(cleaned);
      if (paraphrases.length === this.paraphrases) {
        break;
      }
    }
    return ok(paraphrases);
  }

  /** The original query followed by its paraphrases; just the original when generation fails. */
  async expand(query: string): Promise<string[]> {
    const paraphrases = await this.paraphrase(query);
    if (paraphrases.isErr()) {
      this.logger.warn(`${paraphrases.error.message}; searching the original query only`);
      return [query];
    }
    return [query, ...paraphrases.value];
  }

  async searchExpanded(
    query: string,
    filters: SearchFilters = {},
    k = 5,
  ): Promise<Result<SearchCandidate[], SearchError>> {
    const queries = await this.expand(query);
    const results = await Promise.all(queries.map((q) => this.searcher.search(q, filters, k)));

    const lists: SearchCandidate[][] = [];
    let firstError: SearchError | undefined;
    results.forEach((result, i) => {
      if (result.isOk()) {
        lists.push(result.value);
        return;
      }
      firstError ??= result.error;
      this.logger.warn(`Sub-query "${queries[i] ?? ''}" failed: ${result.error.message}`);
    });

    if (lists.length === 0 && firstError) {
      return err(firstError);
    }
    return ok(unionByBestSimilarity(lists));
  }
}
