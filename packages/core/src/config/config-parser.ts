import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { StudyRAGConfig } from '../types/config.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const CONFIG_FILE_NAME = '.studyrag.yaml';

// --- Zod Schemas ---

const embeddingConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai-compatible']),
  model: z.string().min(1, 'Embedding model must not be empty'),
  dimensions: z.number().int('Dimensions must be an integer').positive('Dimensions must be positive'),
  baseUrl: z.string().url('Embedding baseUrl must be a URL').optional(),
  apiKey: z.string().optional(),
  maxBatchSize: z.number().int().positive('maxBatchSize must be positive').optional(),
});

const llmConfigSchema = z.object({
  provider: z.literal('ollama'),
  model: z.string().min(1, 'LLM model must not be empty'),
  baseUrl: z.string().url('LLM baseUrl must be a URL').optional(),
  timeout: z.number().int().positive('timeout must be positive').optional(),
});

const rerankerConfigSchema = z.object({
  enabled: z.boolean(),
  provider: z.enum(['tei', 'ollama']),
  model: z.string().min(1, 'Reranker model must not be empty'),
  baseUrl: z.string().url('Reranker baseUrl must be a URL').optional(),
});

const searchConfigSchema = z.object({
  topK: z.number().int('topK must be an integer').positive('topK must be positive'),
  rerankFactor: z.number().int('rerankFactor must be an integer').min(1, 'rerankFactor must be at least 1'),
  expansions: z.number().int('expansions must be an integer').min(0, 'expansions must not be negative'),
  maxSteps: z.number().int('maxSteps must be an integer').positive('maxSteps must be positive'),
});

const chunkBudgetSchema = z
  .object({
    size: z.number().int().positive('size must be positive'),
    overlap: z.number().int().min(0, 'overlap must not be negative'),
  })
  .refine((budget) => budget.overlap < budget.size, { message: 'overlap must be smaller than size' });

const chunkingConfigSchema = z.object({
  budgets: z
    .object({
      faq: chunkBudgetSchema.optional(),
      checklist: chunkBudgetSchema.optional(),
      admissions: chunkBudgetSchema.optional(),
      reddit: chunkBudgetSchema.optional(),
      general: chunkBudgetSchema.optional(),
    })
    .strict()
    .optional(),
});

const storageConfigSchema = z.object({
  path: z.string().min(1, 'Storage path must not be empty'),
});

const schoolSchema = z.object({
  id: z.string().min(1, 'School id must not be empty'),
  name: z.string().min(1, 'School name must not be empty'),
  domain: z.string().min(1).optional(),
});

const factsConfigSchema = z.object({
  path: z.string().min(1, 'Facts path must not be empty'),
});

const studyRAGConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  embedding: embeddingConfigSchema,
  llm: llmConfigSchema,
  reranker: rerankerConfigSchema.optional(),
  search: searchConfigSchema,
  chunking: chunkingConfigSchema,
  storage: storageConfigSchema,
  schools: z.array(schoolSchema).min(1, 'schools must list at least one school').optional(),
  facts: factsConfigSchema.optional(),
});

// --- Defaults ---

export const DEFAULT_CONFIG: StudyRAGConfig = {
  version: '1',
  embedding: {
    provider: 'ollama',
    model: 'bge-m3',
    dimensions: 1024,
  },
  llm: {
    provider: 'ollama',
    model: 'qwen2.5:7b',
  },
  reranker: {
    enabled: false,
    provider: 'tei',
    model: 'BAAI/bge-reranker-v2-m3',
  },
  search: {
    topK: 5,
    rerankFactor: 3,
    expansions: 3,
    maxSteps: 5,
  },
  chunking: {},
  storage: {
    path: '.studyrag',
  },
};

// --- Environment variable interpolation ---

/** `${NAME}` is replaced from the environment; `\${NAME}` stays literal. */
const ENV_VAR_PATTERN = /\\?\$\{([^}]+)\}/g;

function interpolateString(value: string, missing: Set<string>): string {
  return value.replace(ENV_VAR_PATTERN, (match: string, varName: string) => {
    if (match.startsWith('\\')) {
      return match.slice(1);
    }
    const envValue = process.env[varName];
    if (envValue === undefined) {
      missing.add(varName);
      return match;
    }
    return envValue;
  });
}

function interpolateValue(value: unknown, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return interpolateString(value, missing);
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateValue(item, missing));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, interpolateValue(item, missing)]),
    );
  }
  return value;
}

export function interpolateEnvVars(value: unknown): Result<unknown, ConfigError> {
  const missing = new Set<string>();
  const interpolated = interpolateValue(value, missing);
  if (missing.size > 0) {
    return err(
      new ConfigError(
        `Missing environment variable(s): ${[...missing].join(', ')}. Set them before running studyrag.`,
      ),
    );
  }
  return ok(interpolated);
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Non-object values are passed through so validation can name them. */
function mergeSection(defaults: object, value: unknown): unknown {
  if (value === undefined || value === null) {
    return { ...defaults };
  }
  return isRecord(value) ? { ...defaults, ...value } : value;
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    embedding: mergeSection(DEFAULT_CONFIG.embedding, partial['embedding']),
    llm: mergeSection(DEFAULT_CONFIG.llm, partial['llm']),
    search: mergeSection(DEFAULT_CONFIG.search, partial['search']),
    chunking: mergeSection(DEFAULT_CONFIG.chunking, partial['chunking']),
    storage: mergeSection(DEFAULT_CONFIG.storage, partial['storage']),
    ...(partial['reranker'] !== undefined
      ? { reranker: mergeSection(DEFAULT_CONFIG.reranker ?? {}, partial['reranker']) }
      : {}),
    ...(partial['schools'] !== undefined ? { schools: partial['schools'] } : {}),
    ...(partial['facts'] !== undefined ? { facts: partial['facts'] } : {}),
  };
}

/** Validates an already-parsed config document. */
export function parseConfig(document: unknown): Result<StudyRAGConfig, ConfigError> {
  if (!isRecord(document)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(document);
  if (interpolated.isErr()) {
    return err(interpolated.error);
  }
  if (!isRecord(interpolated.value)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const validationResult = studyRAGConfigSchema.safeParse(applyDefaults(interpolated.value));
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }
  return ok(validationResult.data);
}

// --- Main ---

export async function loadConfig(rootDir: string): Promise<Result<StudyRAGConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${configPath}. Run "studyrag init" first.`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}

/** YAML text for a fresh project, as written by `studyrag init`. */
export function serializeConfig(config: StudyRAGConfig = DEFAULT_CONFIG): string {
  return stringify(config);
}
