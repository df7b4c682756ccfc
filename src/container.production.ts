/**
 * Production container: OpenAI-compatible backends from environment keys,
 * Supabase or JSONL persistence, Axiom or console logging.
 */

import { createContainer, type Container } from './container.js';
import { loadConfigFromEnv, type PipelineConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConfigError } from './errors.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { IGenerationBackend } from './providers/IGenerationBackend.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { OpenAIGenerationBackend } from './providers/OpenAIGenerationBackend.js';
import type { IExampleRepository } from './repositories/IExampleRepository.js';
import { JsonlExampleRepository } from './repositories/JsonlExampleRepository.js';
import { SupabaseExampleRepository } from './repositories/SupabaseExampleRepository.js';

type Env = Record<string, string | undefined>;

let cached: Container | null = null;

export function createLogProvider(env: Env): ILogProvider {
  // Axiom logging when configured, console otherwise.
  const apiToken = env.AXIOM_API_KEY;
  const dataset = env.AXIOM_DATASET;
  return apiToken && dataset
    ? new AxiomLogProvider({ apiToken, dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });
}

/** One SDK client per configured backend whose key is present. */
export function createBackends(
  config: PipelineConfig,
  env: Env,
  logProvider: ILogProvider
): Record<string, IGenerationBackend> {
  const backends: Record<string, IGenerationBackend> = {};

  for (const backend of config.backends) {
    const apiKey = env[backend.apiKeyEnv];
    if (!apiKey) {
      logProvider.warn('Backend skipped: API key not set', {
        id: backend.id,
        apiKeyEnv: backend.apiKeyEnv,
      });
      continue;
    }
    backends[backend.id] = new OpenAIGenerationBackend({
      model: backend.model,
      apiKey,
      baseURL: backend.baseUrl,
    });
  }

  if (Object.keys(backends).length === 0) {
    throw new ConfigError(
      'No generation backend is usable: set GROQ_API_KEY, GOOGLE_API_KEY or OPENAI_API_KEY, or list backends in SYNTHROUTE_CONFIG'
    );
  }
  return backends;
}

export function createRepository(config: PipelineConfig, env: Env): IExampleRepository {
  return env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
    ? new SupabaseExampleRepository(getSupabaseClient(env))
    : new JsonlExampleRepository(config.outputPath);
}

export function getProductionContainer(env: Env = process.env): Container {
  if (cached) return cached;

  const config = loadConfigFromEnv(env);
  const logProvider = createLogProvider(env);

  cached = createContainer({
    config,
    backends: createBackends(config, env, logProvider),
    repository: createRepository(config, env),
    logProvider,
  });
  return cached;
}
