export { pipeline } from './pipeline.js';
export type { GenerationContext, GenerationResult, Handler, Middleware } from './pipeline.js';
export { errorHandler, toBackendError } from './error-handler.js';
export { createTimeoutMiddleware } from './timeout.js';
export { createLoggingMiddleware } from './logging.js';
