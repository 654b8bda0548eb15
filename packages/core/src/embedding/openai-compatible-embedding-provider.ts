import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { EmbeddingError, type EmbeddingProvider } from '../types/provider.js';
import { errorMessage } from '../utils/logger.js';
import { checkVectors, splitIntoBatches } from './vectors.js';

export interface OpenAICompatibleEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  apiKey?: string;
  maxBatchSize: number;
  timeout: number;
}

const DEFAULT_CONFIG: OpenAICompatibleEmbeddingConfig = {
  baseUrl: 'http://localhost:1234/v1',
  model: 'bge-m3',
  dimensions: 1024,
  maxBatchSize: 100,
  timeout: 60_000,
};

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      embedding: z.array(z.number()),
    }),
  ),
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Embeddings from any server speaking the OpenAI `/embeddings` protocol
 * (LM Studio, vLLM, text-embeddings-inference, OpenAI itself).
 */
export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
  private readonly config: OpenAICompatibleEmbeddingConfig;

  constructor(config?: Partial<OpenAICompatibleEmbeddingConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(texts: string[]): Promise<Result<number[][], EmbeddingError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const allEmbeddings: number[][] = [];
    for (const batch of splitIntoBatches(texts, this.config.maxBatchSize)) {
      const result = await this.embedBatch(batch);
      if (result.isErr()) {
        return err(result.error);
      }
      allEmbeddings.push(...result.value);
    }

    return ok(allEmbeddings);
  }

  private async embedBatch(texts: string[]): Promise<Result<number[][], EmbeddingError>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    let body: unknown;
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/embeddings`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          input: texts,
          model: this.config.model,
        }),
        signal: AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        const detail = await this.extractErrorMessage(response);
        return err(
          new EmbeddingError(
            `OpenAI-compatible embedding API returned status ${response.status}: ${detail}`,
          ),
        );
      }
      body = await response.json();
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        return err(
          new EmbeddingError(
            `Cannot connect to embedding server at ${this.config.baseUrl}: ${message}`,
          ),
        );
      }
      return err(new EmbeddingError(`OpenAI-compatible embed request failed: ${message}`));
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new EmbeddingError('Invalid response: data is not an array of embeddings'));
    }

    const sorted = [...parsed.data.data].sort((a, b) => a.index - b.index);
    return checkVectors(
      sorted.map((item) => item.embedding),
      texts.length,
      this.config.dimensions,
    );
  }

  private async extractErrorMessage(response: Response): Promise<string> {
    try {
      const parsed = errorResponseSchema.safeParse(await response.json());
      if (parsed.success) {
        return parsed.data.error.message;
      }
    } catch {
      // Body is not JSON; statusText is all there is.
    }
    return response.statusText;
  }
}
