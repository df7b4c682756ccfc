import { loadConfig, type PipelineConfig, type PipelineConfigInput } from '../../src/config.js';
import type { BackendLease } from '../../src/services/BackendPool.js';
import type { GenerationContext } from '../../src/middleware/pipeline.js';
import type { GenerationTask } from '../../src/types/models.js';
import { MockGenerationBackend } from './MockGenerationBackend.js';

export function makeTask(overrides: Partial<GenerationTask> = {}): GenerationTask {
  return {
    id: 'task-1',
    domain: 'payments',
    persona: 'backend engineer',
    variant: 'codebase_search',
    queryStyle: 'terse: short imperative request',
    complexity: 'simple',
    ...overrides,
  };
}

export function makeLease(overrides: Partial<BackendLease> = {}): BackendLease {
  return {
    id: 'backend-a',
    model: 'test-model',
    backend: new MockGenerationBackend([], 'ok'),
    ...overrides,
  };
}

export function makeContext(overrides: Partial<GenerationContext> = {}): GenerationContext {
  return {
    task: makeTask(),
    lease: makeLease(),
    system: 'system prompt',
    prompt: 'user prompt',
    temperature: 0.5,
    signal: new AbortController().signal,
    ...overrides,
  };
}

/** Small, fully specified configuration; catalogs are fixed so runs are predictable. */
export function testConfig(overrides: Partial<PipelineConfigInput> = {}): PipelineConfig {
  return loadConfig({
    targetTotal: 4,
    concurrency: 1,
    attemptBudget: 3,
    seed: 7,
    resume: false,
    domains: ['payments', 'search'],
    personas: ['backend engineer', 'data scientist'],
    queryStyles: [{ name: 'terse', description: 'short imperative request' }],
    backends: [{ id: 'a', model: 'model-a', apiKeyEnv: 'TEST_KEY' }],
    ...overrides,
  });
}
