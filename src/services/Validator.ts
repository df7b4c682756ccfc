/**
 * Validator: turns raw backend text into a typed Example or a rejection.
 *
 * Checks run in order and stop at the first failing layer:
 *   1. JSON            → schema_mismatch
 *   2. discriminator   → discriminator_ambiguous
 *   3. structure       → schema_mismatch (all field issues at once, including
 *                        chat-template control tokens in any string)
 *   4. domain logic    → domain_logic_violation
 */

import { z } from 'zod';
import type { ValidationPolicy } from '../config.js';
import type { RegisteredVariant, SchemaRegistry } from '../schemas/SchemaRegistry.js';
import type {
  FieldIssue,
  GenerationTask,
  RejectedOutcome,
  RejectionReason,
  ValidationOutcome,
} from '../types/models.js';
import { isRecord } from '../utils/guards.js';
import { LLAMA3_RESERVED_TOKENS } from './Formatter.js';

const GENERIC_PHRASES = [
  'i need to',
  'i should',
  'let me',
  'i will',
  'the user wants',
  'the user is asking',
];

const PLACEHOLDER_MARKERS = ['lorem ipsum', 'placeholder', 'xxx', 'foo bar baz'];

const PARROT_PREFIX_LENGTH = 20;

// ── Helpers ──

/** Remove one surrounding markdown code fence, if present. */
export function stripCodeFence(raw: string): string {
  const match = /^\s*```[\w-]*[^\S\n]*\n?([\s\S]*?)\n?\s*```\s*$/.exec(raw);
  return match ? match[1] : raw.trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function wordSet(text: string): Set<string> {
  return new Set(normalizeText(text).split(/[^a-z0-9_']+/).filter(Boolean));
}

/** Reasoning that restates the query instead of explaining the tool choice. */
export function isParroting(query: string, reasoning: string, threshold: number): boolean {
  const q = normalizeText(query);
  const r = normalizeText(reasoning);
  if (q.length > 0 && r.startsWith(q.slice(0, PARROT_PREFIX_LENGTH))) return true;

  const a = wordSet(query);
  const b = wordSet(reasoning);
  if (a.size === 0 || b.size === 0) return false;
  let shared = 0;
  for (const word of a) if (b.has(word)) shared++;
  return shared / (a.size + b.size - shared) >= threshold;
}

function mentionsVariant(reasoning: string, variant: RegisteredVariant): boolean {
  const text = reasoning.toLowerCase();
  return (
    text.includes(variant.tag) ||
    text.includes(variant.tag.replace(/_/g, ' ')) ||
    variant.reasoningKeywords.some((keyword) => text.includes(keyword))
  );
}

/** One issue per string field, at any depth, that embeds a reserved token. */
export function findReservedTokens(
  value: unknown,
  tokens: readonly string[],
  path: string
): FieldIssue[] {
  if (typeof value === 'string') {
    const token = tokens.find((t) => value.includes(t));
    return token ? [{ path, message: `${path} contains the reserved token ${token}` }] : [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => findReservedTokens(item, tokens, `${path}.${index}`));
  }
  if (isRecord(value)) {
    return Object.entries(value).flatMap(([key, item]) =>
      findReservedTokens(item, tokens, `${path}.${key}`)
    );
  }
  return [];
}

function reject(reason: RejectionReason, message: string, issues: FieldIssue[] = []): RejectedOutcome {
  return { status: 'rejected', reason, message, issues };
}

// ── Service ──

function buildEnvelope(policy: ValidationPolicy) {
  return z.object({
    query: z
      .string({ required_error: 'query is required' })
      .trim()
      .min(policy.minQueryLength, `query must be at least ${policy.minQueryLength} characters`),
    reasoning: z
      .string({ required_error: 'reasoning is required' })
      .refine(
        (text) => countWords(text) >= policy.minReasoningWords,
        `reasoning must have at least ${policy.minReasoningWords} words`
      )
      .refine(
        (text) => countWords(text) <= policy.maxReasoningWords,
        `reasoning must have at most ${policy.maxReasoningWords} words`
      ),
  });
}

export class Validator {
  private readonly envelope: ReturnType<typeof buildEnvelope>;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly policy: ValidationPolicy,
    private readonly reservedTokens: readonly string[] = LLAMA3_RESERVED_TOKENS
  ) {
    this.envelope = buildEnvelope(policy);
  }

  validate(raw: string, task: GenerationTask): ValidationOutcome {
    // 1. JSON
    let parsed: unknown;
    try {
      parsed = JSON.parse(stripCodeFence(raw));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return reject('schema_mismatch', 'Response is not valid JSON', [{ path: '', message }]);
    }
    if (!isRecord(parsed)) {
      return reject('schema_mismatch', 'Response is not a JSON object', [
        { path: '', message: 'expected an object' },
      ]);
    }

    // 2. Discriminator
    const toolCall = parsed.toolCall;
    if (!isRecord(toolCall)) {
      return reject('discriminator_ambiguous', 'Response has no toolCall object', [
        { path: 'toolCall', message: 'toolCall is required' },
      ]);
    }
    const tag = toolCall[this.registry.discriminator];
    const variant = this.registry.get(tag);
    if (!variant) {
      const message =
        tag === undefined ? 'toolCall has no tool field' : `Unknown tool ${JSON.stringify(tag)}`;
      return reject('discriminator_ambiguous', message, [
        { path: `toolCall.${this.registry.discriminator}`, message },
      ]);
    }

    // 3. Structure
    const issues: FieldIssue[] = [];
    const envelope = this.envelope.safeParse(parsed);
    if (!envelope.success) {
      issues.push(
        ...envelope.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }
    if (variant.tag !== task.variant) {
      issues.push({
        path: `toolCall.${this.registry.discriminator}`,
        message: `expected "${task.variant}", got "${variant.tag}"`,
      });
    }
    for (const field of ['query', 'reasoning'] as const) {
      issues.push(...findReservedTokens(parsed[field], this.reservedTokens, field));
    }
    issues.push(...findReservedTokens(toolCall.arguments, this.reservedTokens, 'toolCall.arguments'));
    const call = variant.parse(toolCall);
    if (!call.ok) {
      issues.push(
        ...call.issues.map((issue) => ({
          path: issue.path ? `toolCall.${issue.path}` : 'toolCall',
          message: issue.message,
        }))
      );
    }
    if (!envelope.success || !call.ok || issues.length > 0) {
      return reject(
        'schema_mismatch',
        `${issues.length} field issue${issues.length === 1 ? '' : 's'}`,
        issues
      );
    }

    // 4. Domain logic
    const query = envelope.data.query;
    const reasoning = envelope.data.reasoning.replace(/\s+/g, ' ').trim();
    const violations: FieldIssue[] = call
      .checkDomainLogic({ query, reasoning, policy: this.policy })
      .map((message) => ({ path: 'toolCall.arguments', message }));

    if (this.policy.requireVariantReference && !mentionsVariant(reasoning, variant)) {
      violations.push({
        path: 'reasoning',
        message: `reasoning does not refer to ${variant.tag}`,
      });
    }
    if (isParroting(query, reasoning, this.policy.parrotingThreshold)) {
      violations.push({ path: 'reasoning', message: 'reasoning repeats the query' });
    }
    if (violations.length > 0) {
      return reject(
        'domain_logic_violation',
        violations.map((v) => v.message).join('; '),
        violations
      );
    }

    // 5. Accept
    const warnings: string[] = [];
    const lowerReasoning = reasoning.toLowerCase();
    if (GENERIC_PHRASES.some((phrase) => lowerReasoning.includes(phrase))) {
      warnings.push('reasoning contains generic phrasing');
    }
    const lowerQuery = query.toLowerCase();
    if (PLACEHOLDER_MARKERS.some((marker) => lowerQuery.includes(marker))) {
      warnings.push('query contains placeholder text');
    }

    return {
      status: 'accepted',
      variant: variant.tag,
      example: {
        query,
        reasoning,
        toolCall: call.call,
        domain: task.domain,
        persona: task.persona,
      },
      warnings,
    };
  }
}
