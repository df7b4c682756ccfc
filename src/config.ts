/**
 * Pipeline configuration.
 * Everything tunable lives here as one immutable struct that the container
 * passes down; nothing reads process.env after startup.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_SYSTEM_PROMPT = [
  'You route a developer request to exactly one tool of a coding agent.',
  'Available tools: codebase_search, file_manager, sandbox_exec, ask_human.',
  'Explain the choice in "reasoning", then emit the call in "toolCall".',
  'Respond with a single JSON object and nothing else.',
].join('\n');

// ── Catalogs shipped in data/ ──

const queryStyleSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
});

export type QueryStyle = z.infer<typeof queryStyleSchema>;

function readCatalog<T>(file: string, schema: z.ZodType<T>): T {
  const url = new URL(`../data/${file}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

export function loadDefaultDomains(): string[] {
  return readCatalog('domains.json', z.array(z.string().min(1)));
}

export function loadDefaultPersonas(): string[] {
  return readCatalog('personas.json', z.array(z.string().min(1)));
}

export function loadDefaultQueryStyles(): QueryStyle[] {
  return readCatalog('query-styles.json', z.array(queryStyleSchema));
}

// ── Schemas ──

export const ValidationPolicySchema = z.object({
  minQueryLength: z.number().int().min(1).default(5),
  minReasoningWords: z.number().int().min(1).default(8),
  maxReasoningWords: z.number().int().min(1).default(100),
  /** Word-overlap ratio at which reasoning counts as a copy of the query. */
  parrotingThreshold: z.number().min(0).max(1).default(0.8),
  requireVariantReference: z.boolean().default(true),
  requireExplicitPath: z.boolean().default(true),
  enforceSearchMode: z.boolean().default(true),
  minSearchQueryLength: z.number().int().min(1).default(2),
  genericSearchTerms: z
    .array(z.string())
    .default(['code', 'file', 'function', 'class', 'todo', 'bug', 'stuff']),
  dangerousCodePatterns: z
    .array(z.string())
    .default(['rm -rf', 'os.system', '__import__', 'eval(', 'shutil.rmtree']),
  dangerousKeywords: z
    .array(z.string())
    .default(['delete', 'drop', 'truncate', 'format', 'shutdown', 'kill', 'wipe', 'purge']),
});

export type ValidationPolicy = z.output<typeof ValidationPolicySchema>;

export const BackendConfigSchema = z.object({
  id: z.string().min(1),
  model: z.string().min(1),
  /** OpenAI-compatible endpoint; the SDK default when omitted. */
  baseUrl: z.string().url().optional(),
  /** Name of the environment variable holding the API key. */
  apiKeyEnv: z.string().min(1),
  weight: z.number().positive().default(1),
  tags: z.array(z.enum(['logic-strong', 'diversity'])).default(['diversity']),
  temperature: z.number().min(0).max(2).optional(),
});

export type BackendConfig = z.output<typeof BackendConfigSchema>;

const VariantWeightsSchema = z
  .object({
    codebase_search: z.number().min(0).default(0.35),
    sandbox_exec: z.number().min(0).default(0.24),
    file_manager: z.number().min(0).default(0.18),
    ask_human: z.number().min(0).default(0.08),
  })
  .refine(
    (weights) => Object.values(weights).some((w) => w > 0),
    'At least one variant weight must be positive'
  );

export const PoolConfigSchema = z.object({
  strategy: z.enum(['weighted-rotation', 'seeded-roulette']).default('weighted-rotation'),
  cooldownMs: z.number().int().min(0).default(30_000),
  demoteAfterFailures: z.number().int().min(1).default(3),
  /** One auth failure never removes a backend for good. */
  authFailureLimit: z.number().int().min(2).default(2),
  /** Weight multiplier for backends whose tags match the task complexity. */
  preferenceBoost: z.number().min(1).default(3),
});

export type PoolConfig = z.output<typeof PoolConfigSchema>;

export const PipelineConfigSchema = z
  .object({
    targetTotal: z.number().int().positive().default(100),
    concurrency: z.number().int().positive().default(4),
    attemptBudget: z.number().int().positive().default(4),
    /** Defaults to targetTotal × attemptBudget × 2. */
    globalAttemptCeiling: z.number().int().positive().optional(),
    seed: z.number().int().default(42),
    resume: z.boolean().default(true),
    outputPath: z.string().min(1).default('output/examples.jsonl'),
    systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
    variants: VariantWeightsSchema.default({}),
    domains: z.array(z.string().min(1)).min(1).default(loadDefaultDomains),
    personas: z.array(z.string().min(1)).min(1).default(loadDefaultPersonas),
    queryStyles: z.array(queryStyleSchema).min(1).default(loadDefaultQueryStyles),
    backends: z.array(BackendConfigSchema).default([]),
    pool: PoolConfigSchema.default({}),
    generation: z
      .object({
        timeoutMs: z.number().int().positive().default(60_000),
        temperature: z.number().min(0).max(2).default(0.85),
      })
      .default({}),
    validation: ValidationPolicySchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.validation.minReasoningWords > config.validation.maxReasoningWords) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['validation', 'minReasoningWords'],
        message: 'minReasoningWords must not exceed maxReasoningWords',
      });
    }
    const ids = new Set<string>();
    for (const [index, backend] of config.backends.entries()) {
      if (ids.has(backend.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['backends', index, 'id'],
          message: `Duplicate backend id "${backend.id}"`,
        });
      }
      ids.add(backend.id);
    }
  })
  .transform((config) => ({
    ...config,
    globalAttemptCeiling:
      config.globalAttemptCeiling ?? config.targetTotal * config.attemptBudget * 2,
  }));

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type PipelineConfig = z.output<typeof PipelineConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

/** Parse and freeze a configuration object. Throws ConfigError listing every issue. */
export function loadConfig(input: unknown = {}): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid pipeline configuration: ${issues.join('; ')}`, { issues });
  }
  return deepFreeze(result.data);
}

// ── Environment ──

type Env = Record<string, string | undefined>;

/** Backends implied by whichever provider keys are present. */
export function defaultBackendsFromEnv(env: Env): z.input<typeof BackendConfigSchema>[] {
  const backends: z.input<typeof BackendConfigSchema>[] = [];

  if (env.GROQ_API_KEY) {
    backends.push(
      {
        id: 'groq-large',
        model: 'llama-3.3-70b-versatile',
        baseUrl: 'https://api.groq.com/openai/v1',
        apiKeyEnv: 'GROQ_API_KEY',
        weight: 1,
        tags: ['logic-strong'],
      },
      {
        id: 'groq-instant',
        model: 'llama-3.1-8b-instant',
        baseUrl: 'https://api.groq.com/openai/v1',
        apiKeyEnv: 'GROQ_API_KEY',
        weight: 2,
        tags: ['diversity'],
      }
    );
  }

  if (env.GOOGLE_API_KEY) {
    backends.push({
      id: 'gemini-flash',
      model: 'gemini-2.0-flash',
      baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
      apiKeyEnv: 'GOOGLE_API_KEY',
      weight: 1,
      tags: ['logic-strong', 'diversity'],
    });
  }

  if (env.OPENAI_API_KEY) {
    backends.push({
      id: 'openai-mini',
      model: 'gpt-4o-mini',
      apiKeyEnv: 'OPENAI_API_KEY',
      weight: 1,
      tags: ['diversity'],
    });
  }

  return backends;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file "${path}"`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file "${path}" is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Build configuration from the environment:
 * SYNTHROUTE_CONFIG names a JSON file; SYNTHROUTE_TARGET_TOTAL,
 * SYNTHROUTE_CONCURRENCY, SYNTHROUTE_SEED and SYNTHROUTE_OUTPUT override it.
 */
export function loadConfigFromEnv(env: Env = process.env): PipelineConfig {
  const base = env.SYNTHROUTE_CONFIG ? readConfigFile(env.SYNTHROUTE_CONFIG) : {};
  if (typeof base !== 'object' || base === null || Array.isArray(base)) {
    throw new ConfigError('Config file must contain a JSON object');
  }

  const input: Record<string, unknown> = { ...base };
  if (env.SYNTHROUTE_TARGET_TOTAL) input.targetTotal = Number(env.SYNTHROUTE_TARGET_TOTAL);
  if (env.SYNTHROUTE_CONCURRENCY) input.concurrency = Number(env.SYNTHROUTE_CONCURRENCY);
  if (env.SYNTHROUTE_SEED) input.seed = Number(env.SYNTHROUTE_SEED);
  if (env.SYNTHROUTE_OUTPUT) input.outputPath = env.SYNTHROUTE_OUTPUT;
  if (!Array.isArray(input.backends) || input.backends.length === 0) {
    input.backends = defaultBackendsFromEnv(env);
  }

  return loadConfig(input);
}
