/**
 * Canned backend responses built from the registry's sample calls.
 */

import {
  ASK_HUMAN,
  CODEBASE_SEARCH,
  FILE_MANAGER,
  SANDBOX_EXEC,
  type RegisteredVariant,
} from '../../src/schemas/SchemaRegistry.js';
import type { GenerationRequest } from '../../src/providers/IGenerationBackend.js';
import type { ToolName } from '../../src/types/models.js';

const VARIANTS: Record<ToolName, RegisteredVariant> = {
  codebase_search: CODEBASE_SEARCH,
  file_manager: FILE_MANAGER,
  sandbox_exec: SANDBOX_EXEC,
  ask_human: ASK_HUMAN,
};

/** The sample example of a variant as raw backend text; `n` makes the query unique. */
export function sampleResponse(tag: ToolName, n?: number): string {
  const { query, reasoning, toolCall } = VARIANTS[tag].sample;
  return JSON.stringify({
    query: n === undefined ? query : `${query} (ticket ${n})`,
    reasoning,
    toolCall,
  });
}

export function variantFromPrompt(prompt: string): ToolName {
  const match = /Tool to call: (\w+)/.exec(prompt);
  const tag = match?.[1];
  const variant = Object.values(VARIANTS).find((v) => v.tag === tag);
  if (!variant) throw new Error(`prompt names no known tool: ${String(tag)}`);
  return variant.tag;
}

/** Answers every prompt with a valid, never-repeated example of the requested variant. */
export function uniqueResponder(start = 0): (request: GenerationRequest) => string {
  let n = start;
  return (request) => sampleResponse(variantFromPrompt(request.prompt), ++n);
}
