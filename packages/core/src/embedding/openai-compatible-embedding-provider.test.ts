import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAICompatibleEmbeddingProvider } from './openai-compatible-embedding-provider.js';
import { EmbeddingError } from '../types/provider.js';

function jsonResponse(body: unknown, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Unauthorized',
    json: vi.fn().mockResolvedValue(body),
  } as unknown as Response;
}

describe('OpenAICompatibleEmbeddingProvider', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = vi.fn();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('should order embeddings by their index field', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );

    const provider = new OpenAICompatibleEmbeddingProvider({ dimensions: 2 });
    const result = await provider.embed(['first', 'second']);

    expect(result._unsafeUnwrap()).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('should send the bearer token when an apiKey is configured', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      jsonResponse({ data: [{ index: 0, embedding: [1] }] }),
    );

    const provider = new OpenAICompatibleEmbeddingProvider({
      baseUrl: 'http://embed.local/v1/',
      apiKey: 'test-key',
      dimensions: 1,
    });
    await provider.embed(['x']);

    expect(globalThis.fetch).toHaveBeenCalledWith(
      'http://embed.local/v1/embeddings',
      expect.objectContaining({
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
      }),
    );
  });

  it('should surface the server error message on failure', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      jsonResponse({ error: { message: 'invalid api key' } }, 401),
    );

    const result = await new OpenAICompatibleEmbeddingProvider().embed(['x']);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(EmbeddingError);
    expect(result._unsafeUnwrapErr().message).toBe(
      'OpenAI-compatible embedding API returned status 401: invalid api key',
    );
  });

  it('should explain connection failures', async () => {
    vi.mocked(globalThis.fetch).mockRejectedValue(new TypeError('fetch failed'));

    const result = await new OpenAICompatibleEmbeddingProvider().embed(['x']);

    expect(result._unsafeUnwrapErr().message).toContain(
      'Cannot connect to embedding server at http://localhost:1234/v1',
    );
  });

  it('should reject a body without a data array', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(jsonResponse({ object: 'list' }));

    const result = await new OpenAICompatibleEmbeddingProvider().embed(['x']);

    expect(result._unsafeUnwrapErr().message).toContain('Invalid response');
  });
});
