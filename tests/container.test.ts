import { afterEach, describe, it, expect } from 'vitest';
import { createContainer, createStrategy } from '../src/container.js';
import { createBackends, createLogProvider, createRepository } from '../src/container.production.js';
import { ConfigError } from '../src/errors.js';
import { AxiomLogProvider } from '../src/providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from '../src/providers/ConsoleLogProvider.js';
import { OpenAIGenerationBackend } from '../src/providers/OpenAIGenerationBackend.js';
import { JsonlExampleRepository } from '../src/repositories/JsonlExampleRepository.js';
import { SeededRouletteStrategy } from '../src/strategies/SeededRouletteStrategy.js';
import { WeightedRotationStrategy } from '../src/strategies/WeightedRotationStrategy.js';
import { MockExampleRepository } from './mocks/MockExampleRepository.js';
import { MockGenerationBackend } from './mocks/MockGenerationBackend.js';
import { testConfig } from './mocks/fixtures.js';

const twoBackends = testConfig({
  backends: [
    { id: 'a', model: 'model-a', apiKeyEnv: 'KEY_A' },
    { id: 'b', model: 'model-b', apiKeyEnv: 'KEY_B' },
  ],
});

describe('createContainer', () => {
  it('should wire a pool from the implementations it is given', () => {
    const logProvider = new ConsoleLogProvider();
    const container = createContainer({
      config: twoBackends,
      backends: { a: new MockGenerationBackend([], 'ok'), b: new MockGenerationBackend([], 'ok') },
      repository: new MockExampleRepository(),
      logProvider,
    });

    expect(container.pool.size).toBe(2);
    expect(container.registry.tags()).toEqual(['codebase_search', 'file_manager', 'sandbox_exec', 'ask_human']);
    expect(logProvider.events).toEqual([]);
  });

  it('should skip and warn about a backend with no implementation', () => {
    const logProvider = new ConsoleLogProvider();
    const container = createContainer({
      config: twoBackends,
      backends: { a: new MockGenerationBackend([], 'ok') },
      repository: new MockExampleRepository(),
      logProvider,
    });

    expect(container.pool.size).toBe(1);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0].level).toBe('warn');
    expect(logProvider.events[0].fields).toEqual({ id: 'b' });
  });
});

describe('createStrategy', () => {
  it('should follow the configured strategy name', () => {
    expect(createStrategy(testConfig())).toBeInstanceOf(WeightedRotationStrategy);
    expect(createStrategy(testConfig({ pool: { strategy: 'seeded-roulette' } }))).toBeInstanceOf(
      SeededRouletteStrategy
    );
  });
});

describe('production wiring', () => {
  let axiom: AxiomLogProvider | null = null;

  afterEach(async () => {
    await axiom?.dispose();
    axiom = null;
  });

  it('should log to Axiom only when both settings are present', () => {
    const provider = createLogProvider({ AXIOM_API_KEY: 'test-secret', AXIOM_DATASET: 'runs' });
    expect(provider).toBeInstanceOf(AxiomLogProvider);
    if (provider instanceof AxiomLogProvider) axiom = provider;

    expect(createLogProvider({ AXIOM_API_KEY: 'test-secret' })).toBeInstanceOf(ConsoleLogProvider);
  });

  it('should build backends whose key is set and warn about the rest', () => {
    const logProvider = new ConsoleLogProvider();
    const backends = createBackends(twoBackends, { KEY_A: 'test-secret' }, logProvider);

    expect(Object.keys(backends)).toEqual(['a']);
    expect(backends.a).toBeInstanceOf(OpenAIGenerationBackend);
    expect(logProvider.events.map((e) => e.message)).toEqual(['Backend skipped: API key not set']);
  });

  it('should fail when no backend has a key', () => {
    expect(() => createBackends(twoBackends, {}, new ConsoleLogProvider())).toThrow(ConfigError);
  });

  it('should write JSONL unless Supabase is configured', () => {
    const repository = createRepository(twoBackends, {});
    expect(repository).toBeInstanceOf(JsonlExampleRepository);
    if (repository instanceof JsonlExampleRepository) {
      expect(repository.path).toBe('output/examples.jsonl');
    }
  });
});
