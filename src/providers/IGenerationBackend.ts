/**
 * Generation backend interface.
 * Wraps an external text-generation service (any OpenAI-compatible endpoint).
 * Implementations throw BackendError for failures they can classify.
 */

export interface GenerationRequest {
  system: string;
  prompt: string;
  temperature: number;
  /** Aborted when the call exceeds its timeout or the run is cancelled. */
  signal: AbortSignal;
}

export interface IGenerationBackend {
  /** Send one completion request and return the raw response text. */
  complete(request: GenerationRequest): Promise<string>;
}
