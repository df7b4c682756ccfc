export * from './errors.js';
export * from './config.js';
export * from './types/models.js';

export * from './schemas/toolCalls.js';
export * from './schemas/SchemaRegistry.js';
export { detectLiteralSymbol, normalizePath } from './schemas/domainRules.js';
export type { DomainContext } from './schemas/domainRules.js';

export * from './providers/index.js';
export * from './strategies/index.js';
export * from './middleware/index.js';

export type { IExampleRepository } from './repositories/IExampleRepository.js';
export { JsonlExampleRepository } from './repositories/JsonlExampleRepository.js';
export { SupabaseExampleRepository } from './repositories/SupabaseExampleRepository.js';

export * from './services/BackendPool.js';
export * from './services/PromptBuilder.js';
export * from './services/Generator.js';
export * from './services/Validator.js';
export * from './services/Deduplicator.js';
export * from './services/Formatter.js';
export * from './services/QuotaTracker.js';
export * from './services/RunStatistics.js';
export * from './services/PipelineOrchestrator.js';
export * from './services/DatasetAuditor.js';
export * from './services/DatasetSplitter.js';

export { createRng } from './utils/random.js';
export type { Rng } from './utils/random.js';

export { createContainer, createStrategy } from './container.js';
export type { Container } from './container.js';
export { getProductionContainer } from './container.production.js';
