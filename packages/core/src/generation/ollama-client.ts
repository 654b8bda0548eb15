import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { GenerationError, type LLMProvider } from '../types/provider.js';
import { errorMessage } from '../utils/logger.js';

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  timeout: number;
  /** Maximum tokens to generate per request (Ollama num_predict). 0 = unlimited. */
  maxTokens: number;
  /** Sampling temperature; 0 keeps decisions reproducible. */
  temperature: number;
}

const DEFAULT_CONFIG: OllamaConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'qwen2.5:7b',
  timeout: 60_000,
  maxTokens: 0,
  temperature: 0,
};

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
}

/** JSON-schema description of a callable function, as Ollama expects it. */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, { type: string; description: string; enum?: readonly string[] }>;
      required: string[];
    };
  };
}

export interface ToolCall {
  name: string;
  arguments: unknown;
}

export interface ChatReply {
  content: string;
  toolCalls: ToolCall[];
}

const generateResponseSchema = z.object({ response: z.string() });

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string().default(''),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.unknown(),
          }),
        }),
      )
      .optional(),
  }),
});

/** Plain generation and function-calling chat against a local Ollama server. */
export class OllamaClient implements LLMProvider {
  private readonly config: OllamaConfig;

  constructor(config?: Partial<OllamaConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
  }

  private get options(): Record<string, number> {
    return {
      temperature: this.config.temperature,
      ...(this.config.maxTokens > 0 ? { num_predict: this.config.maxTokens } : {}),
    };
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<Result<unknown, GenerationError>> {
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.config.model, stream: false, options: this.options, ...payload }),
        signal: AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        return err(
          new GenerationError(`Ollama API returned status ${response.status}: ${response.statusText}`),
        );
      }
      const body: unknown = await response.json();
      return ok(body);
    } catch (error) {
      return err(new GenerationError(`Ollama request failed: ${errorMessage(error)}`));
    }
  }

  async generate(prompt: string): Promise<Result<string, GenerationError>> {
    const body = await this.post('/api/generate', { prompt });
    if (body.isErr()) {
      return err(body.error);
    }
    const parsed = generateResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new GenerationError('Invalid response: missing "response" text'));
    }
    return ok(parsed.data.response);
  }

  async chat(
    messages: ChatMessage[],
    tools: ToolDefinition[] = [],
  ): Promise<Result<ChatReply, GenerationError>> {
    const body = await this.post('/api/chat', {
      messages,
      ...(tools.length > 0 ? { tools } : {}),
    });
    if (body.isErr()) {
      return err(body.error);
    }
    const parsed = chatResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new GenerationError('Invalid response: missing chat message'));
    }
    const { content, tool_calls: toolCalls = [] } = parsed.data.message;
    return ok({
      content,
      toolCalls: toolCalls.map((call) => ({
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    });
  }
}
