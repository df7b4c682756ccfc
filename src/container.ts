/**
 * Dependency wiring.
 * Constructs every pipeline service from one immutable configuration.
 * Production passes real backends and storage; tests pass mocks.
 */

import type { PipelineConfig } from './config.js';
import type { IGenerationBackend } from './providers/IGenerationBackend.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IExampleRepository } from './repositories/IExampleRepository.js';
import { SchemaRegistry } from './schemas/SchemaRegistry.js';
import type { ISelectionStrategy } from './strategies/ISelectionStrategy.js';
import { SeededRouletteStrategy } from './strategies/SeededRouletteStrategy.js';
import { WeightedRotationStrategy } from './strategies/WeightedRotationStrategy.js';
import { BackendPool, type BackendPoolOptions } from './services/BackendPool.js';
import { DatasetAuditor } from './services/DatasetAuditor.js';
import { Deduplicator } from './services/Deduplicator.js';
import { Formatter, type ChatTemplate } from './services/Formatter.js';
import { Generator } from './services/Generator.js';
import { PipelineOrchestrator } from './services/PipelineOrchestrator.js';
import { PromptBuilder } from './services/PromptBuilder.js';
import { Validator } from './services/Validator.js';

export interface Container {
  config: PipelineConfig;
  registry: SchemaRegistry;
  pool: BackendPool;
  promptBuilder: PromptBuilder;
  generator: Generator;
  validator: Validator;
  deduplicator: Deduplicator;
  formatter: Formatter;
  orchestrator: PipelineOrchestrator;
  auditor: DatasetAuditor;
  repository: IExampleRepository;
  logProvider: ILogProvider;
}

export function createStrategy(config: PipelineConfig): ISelectionStrategy {
  return config.pool.strategy === 'seeded-roulette'
    ? new SeededRouletteStrategy(config.seed, config.pool.preferenceBoost)
    : new WeightedRotationStrategy(config.pool.preferenceBoost);
}

export function createContainer(deps: {
  config: PipelineConfig;
  /** Backend implementations keyed by the ids in config.backends. */
  backends: Record<string, IGenerationBackend>;
  repository: IExampleRepository;
  logProvider: ILogProvider;
  registry?: SchemaRegistry;
  strategy?: ISelectionStrategy;
  chatTemplate?: ChatTemplate;
  clock?: () => number;
  sleep?: BackendPoolOptions['sleep'];
}): Container {
  const { config } = deps;
  const registry = deps.registry ?? new SchemaRegistry();

  const members = config.backends.flatMap((backend) => {
    const implementation = deps.backends[backend.id];
    if (!implementation) {
      deps.logProvider.warn('Configured backend has no implementation; skipping', { id: backend.id });
      return [];
    }
    return [
      {
        id: backend.id,
        model: backend.model,
        backend: implementation,
        weight: backend.weight,
        tags: backend.tags,
        ...(backend.temperature !== undefined && { temperature: backend.temperature }),
      },
    ];
  });

  const pool = new BackendPool(members, deps.strategy ?? createStrategy(config), {
    cooldownMs: config.pool.cooldownMs,
    demoteAfterFailures: config.pool.demoteAfterFailures,
    authFailureLimit: config.pool.authFailureLimit,
    clock: deps.clock,
    sleep: deps.sleep,
  });
  const promptBuilder = new PromptBuilder(registry, config.validation, config.systemPrompt);
  const generator = new Generator(promptBuilder, deps.logProvider, config.generation);
  const formatter = new Formatter(registry, config.systemPrompt, deps.chatTemplate);
  const validator = new Validator(registry, config.validation, formatter.reservedTokens);
  const deduplicator = new Deduplicator(registry);
  const orchestrator = new PipelineOrchestrator({
    config,
    registry,
    pool,
    generator,
    validator,
    deduplicator,
    formatter,
    repository: deps.repository,
    logProvider: deps.logProvider,
    clock: deps.clock,
  });
  const auditor = new DatasetAuditor(registry, validator, formatter);

  return {
    config,
    registry,
    pool,
    promptBuilder,
    generator,
    validator,
    deduplicator,
    formatter,
    orchestrator,
    auditor,
    repository: deps.repository,
    logProvider: deps.logProvider,
  };
}
