/**
 * Deduplicator: content fingerprints over normalized (query, toolCall) pairs.
 *
 * admit() is synchronous: the check and the insert happen with no await in
 * between, so concurrent workers sharing one instance can never both admit
 * the same fingerprint.
 */

import { createHash } from 'node:crypto';
import { ContractViolationError } from '../errors.js';
import type { SchemaRegistry } from '../schemas/SchemaRegistry.js';
import type { Example, ToolCall } from '../types/models.js';
import { isRecord } from '../utils/guards.js';

export type AdmitResult =
  | { admitted: true; example: Example; fingerprint: string }
  | { admitted: false; reason: 'duplicate'; fingerprint: string };

// ── Normalization ──

function normalizeString(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/** JSON with sorted keys and normalized strings; equal content, equal text. */
export function canonicalJson(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(normalizeString(value));
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (isRecord(value)) {
    const record = value;
    const entries = Object.keys(record)
      .filter((key) => record[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(record[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function computeFingerprint(query: string, toolCall: ToolCall): string {
  return createHash('sha256')
    .update(normalizeString(query))
    .update('\u0000')
    .update(canonicalJson(toolCall))
    .digest('hex');
}

/**
 * Drop optional arguments holding one of their variant's null sentinels.
 * Idempotent. Throws ContractViolationError for a call its own schema rejects.
 */
export function stripNullFields(call: ToolCall, registry: SchemaRegistry): ToolCall {
  const variant = registry.require(call.tool);
  const args: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(call.arguments)) {
    if (value === undefined) continue;
    const sentinels = variant.nullSentinels[key];
    if (sentinels?.some((sentinel) => sentinel === value)) continue;
    args[key] = value;
  }

  const parsed = variant.parse({ tool: call.tool, arguments: args });
  if (!parsed.ok) {
    throw new ContractViolationError(`Stripped ${call.tool} call no longer matches its schema`, {
      issues: parsed.issues,
    });
  }
  return parsed.call;
}

// ── Service ──

export class Deduplicator {
  private readonly seen = new Set<string>();

  constructor(private readonly registry: SchemaRegistry) {}

  get size(): number {
    return this.seen.size;
  }

  /** Strip, fingerprint, then check-and-insert. */
  admit(example: Example): AdmitResult {
    const toolCall = stripNullFields(example.toolCall, this.registry);
    const fingerprint = computeFingerprint(example.query, toolCall);

    if (this.seen.has(fingerprint)) {
      return { admitted: false, reason: 'duplicate', fingerprint };
    }
    this.seen.add(fingerprint);
    return { admitted: true, example: { ...example, toolCall }, fingerprint };
  }

  has(fingerprint: string): boolean {
    return this.seen.has(fingerprint);
  }

  /**
   * Preload fingerprints from persisted records.
   * Uses a stored `fingerprint` when present, otherwise recomputes it.
   * Records that carry neither are skipped. Returns the number added.
   */
  seed(records: readonly unknown[]): number {
    const before = this.seen.size;
    for (const record of records) {
      const fingerprint = this.fingerprintOfRecord(record);
      if (fingerprint) this.seen.add(fingerprint);
    }
    return this.seen.size - before;
  }

  /** Roll back an admission whose record never reached storage. */
  forget(fingerprint: string): boolean {
    return this.seen.delete(fingerprint);
  }

  reset(): void {
    this.seen.clear();
  }

  private fingerprintOfRecord(record: unknown): string | undefined {
    if (!isRecord(record)) return undefined;
    if (typeof record.fingerprint === 'string' && record.fingerprint !== '') {
      return record.fingerprint;
    }
    if (typeof record.query !== 'string' || !isRecord(record.toolCall)) return undefined;

    const variant = this.registry.get(record.toolCall[this.registry.discriminator]);
    const parsed = variant?.parse(record.toolCall);
    if (!parsed?.ok) return undefined;
    return computeFingerprint(record.query, stripNullFields(parsed.call, this.registry));
  }
}
