import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { RerankUnavailableError, type RelevanceScorer } from '../types/provider.js';
import { errorMessage } from '../utils/logger.js';

export interface TeiScorerConfig {
  baseUrl: string;
  timeout: number;
}

const teiResponseSchema = z.array(z.object({ index: z.number().int(), score: z.number() }));

/**
 * Cross-encoder scores from a text-embeddings-inference server hosting a
 * reranker model such as bge-reranker (`POST /rerank`).
 */
export class TeiRelevanceScorer implements RelevanceScorer {
  private readonly config: TeiScorerConfig;

  constructor(config?: Partial<TeiScorerConfig>) {
    this.config = {
      baseUrl: (config?.baseUrl ?? 'http://localhost:8080').replace(/\/+$/, ''),
      timeout: config?.timeout ?? 30_000,
    };
  }

  async score(query: string, passages: string[]): Promise<Result<number[], RerankUnavailableError>> {
    if (passages.length === 0) {
      return ok([]);
    }

    let body: unknown;
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/rerank`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ query, texts: passages }),
        signal: AbortSignal.timeout(this.config.timeout),
      });
      if (!response.ok) {
        return err(
          new RerankUnavailableError(`Rerank API returned status ${response.status}: ${response.statusText}`),
        );
      }
      body = await response.json();
    } catch (error) {
      return err(new RerankUnavailableError(`Rerank request failed: ${errorMessage(error)}`));
    }

    const parsed = teiResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new RerankUnavailableError('Invalid response: expected [{index, score}]'));
    }

    const scores: number[] = new Array<number>(passages.length).fill(Number.NEGATIVE_INFINITY);
    for (const { index, score } of parsed.data) {
      if (index >= 0 && index < passages.length) {
        scores[index] = score;
      }
    }
    return ok(scores);
  }
}

export interface OllamaScorerConfig {
  model: string;
  baseUrl: string;
  timeout: number;
}

/** Neutral midpoint score assigned when scoring fails for a single passage. */
const DEFAULT_SCORE = 50;
const MAX_QUERY_LENGTH = 500;
const MAX_PASSAGE_LENGTH = 2000;

const generateResponseSchema = z.object({ response: z.string() });

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

function buildScoringPrompt(query: string, passage: string): string {
  return [
    'Rate relevance 0-100 of this passage to the question. Reply with ONLY the number.',
    `<question>${truncate(query, MAX_QUERY_LENGTH)}</question>`,
    '<passage>',
    truncate(passage, MAX_PASSAGE_LENGTH),
    '</passage>',
    'Score:',
  ].join('\n');
}

export function parseScore(response: string): number {
  const match = response.match(/-?\d+/);
  if (!match) {
    return DEFAULT_SCORE;
  }
  const score = parseInt(match[0], 10);
  return Math.max(0, Math.min(100, score));
}

/** Pointwise relevance from a generative model prompted for a 0-100 score. */
export class OllamaRelevanceScorer implements RelevanceScorer {
  private readonly config: OllamaScorerConfig;

  constructor(config: Partial<OllamaScorerConfig> & { model: string }) {
    this.config = {
      model: config.model,
      baseUrl: (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, ''),
      timeout: config.timeout ?? 30_000,
    };
  }

  async score(query: string, passages: string[]): Promise<Result<number[], RerankUnavailableError>> {
    const scores: number[] = [];

    for (const passage of passages) {
      try {
        const response = await globalThis.fetch(`${this.config.baseUrl}/api/generate`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: this.config.model,
            prompt: buildScoringPrompt(query, passage),
            stream: false,
          }),
          signal: AbortSignal.timeout(this.config.timeout),
        });

        if (!response.ok) {
          scores.push(DEFAULT_SCORE);
          continue;
        }

        const parsed = generateResponseSchema.safeParse(await response.json());
        scores.push(parsed.success ? parseScore(parsed.data.response) : DEFAULT_SCORE);
      } catch (error) {
        // Nothing scored yet: the server is most likely unreachable.
        if (scores.length === 0) {
          return err(new RerankUnavailableError(`Ollama request failed: ${errorMessage(error)}`));
        }
        scores.push(DEFAULT_SCORE);
      }
    }

    return ok(scores);
  }
}
