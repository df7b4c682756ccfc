/**
 * Domain models — the records and messages passed between pipeline stages.
 * Decoupled from both wire formats and storage row shapes.
 */

import type { ToolCall, ToolName } from '../schemas/toolCalls.js';

export type { ToolCall, ToolName } from '../schemas/toolCalls.js';

// ── Tasks ──

/** Complex tasks prefer logic-strong backends; simple ones prefer the rest. */
export type TaskComplexity = 'complex' | 'simple';

export interface GenerationTask {
  id: string;
  domain: string;
  persona: string;
  /** Variant the generated record must carry. */
  variant: ToolName;
  /** Communication style the user query should imitate. */
  queryStyle: string;
  complexity: TaskComplexity;
}

// ── Examples ──

export interface Example {
  query: string;
  /** Chain-of-thought explaining the tool choice. */
  reasoning: string;
  toolCall: ToolCall;
  domain: string;
  persona: string;
}

/** An admitted example as written to the output stream. */
export interface PersistedExample extends Example {
  fingerprint: string;
  /** Chat-template rendering consumed by the trainer. */
  text: string;
}

// ── Validation ──

export type RejectionReason =
  | 'schema_mismatch'
  | 'discriminator_ambiguous'
  | 'domain_logic_violation';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'schema_mismatch',
  'discriminator_ambiguous',
  'domain_logic_violation',
];

export interface FieldIssue {
  /** Dotted path of the offending field, e.g. "toolCall.arguments.path". */
  path: string;
  message: string;
}

export interface AcceptedOutcome {
  status: 'accepted';
  variant: ToolName;
  example: Example;
  /** Advisory quality notes that do not block acceptance. */
  warnings: string[];
}

export interface RejectedOutcome {
  status: 'rejected';
  reason: RejectionReason;
  message: string;
  issues: FieldIssue[];
}

export type ValidationOutcome = AcceptedOutcome | RejectedOutcome;

// ── Backends ──

export type BackendTag = 'logic-strong' | 'diversity';
