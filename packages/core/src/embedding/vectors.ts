import { ok, err, type Result } from 'neverthrow';
import { EmbeddingError } from '../types/provider.js';

export function splitIntoBatches<T>(items: T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

/** One vector per input, each of the configured length. */
export function checkVectors(
  vectors: number[][],
  expectedCount: number,
  dimensions: number,
): Result<number[][], EmbeddingError> {
  if (vectors.length !== expectedCount) {
    return err(
      new EmbeddingError(`Expected ${expectedCount} embeddings, received ${vectors.length}`),
    );
  }
  const wrong = vectors.find((vector) => vector.length !== dimensions);
  if (wrong) {
    return err(
      new EmbeddingError(`Expected ${dimensions}-dimensional embeddings, received ${wrong.length}`),
    );
  }
  return ok(vectors);
}

/** Cosine distance in [0, 2]; a zero vector counts as orthogonal to everything. */
export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
