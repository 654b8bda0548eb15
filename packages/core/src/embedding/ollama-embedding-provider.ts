import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { EmbeddingError, type EmbeddingProvider } from '../types/provider.js';
import { errorMessage } from '../utils/logger.js';
import { checkVectors, splitIntoBatches } from './vectors.js';

export interface OllamaEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  timeout: number;
  batchSize: number;
}

const DEFAULT_CONFIG: OllamaEmbeddingConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'bge-m3',
  dimensions: 1024,
  timeout: 30_000,
  batchSize: 32,
};

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly config: OllamaEmbeddingConfig;

  constructor(config?: Partial<OllamaEmbeddingConfig>) {
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
    for (const batch of splitIntoBatches(texts, this.config.batchSize)) {
      const result = await this.embedBatch(batch);
      if (result.isErr()) {
        return err(result.error);
      }
      allEmbeddings.push(...result.value);
    }

    return ok(allEmbeddings);
  }

  private async embedBatch(texts: string[]): Promise<Result<number[][], EmbeddingError>> {
    let body: unknown;
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          input: texts,
        }),
        signal: AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        return err(
          new EmbeddingError(
            `Ollama embed API returned status ${response.status}: ${response.statusText}`,
          ),
        );
      }
      body = await response.json();
    } catch (error) {
      return err(new EmbeddingError(`Ollama embed request failed: ${errorMessage(error)}`));
    }

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new EmbeddingError('Invalid response: embeddings is not an array of vectors'));
    }
    return checkVectors(parsed.data.embeddings, texts.length, this.config.dimensions);
  }
}
