export type { IGenerationBackend, GenerationRequest } from './IGenerationBackend.js';
export {
  OpenAIGenerationBackend,
  classifyOpenAIError,
  parseRetryAfter,
} from './OpenAIGenerationBackend.js';
export type { ChatCompletionFn, OpenAIGenerationBackendOptions } from './OpenAIGenerationBackend.js';
export type { ILogProvider, LogEvent, LogLevel, GenerationLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
