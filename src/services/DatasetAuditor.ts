/**
 * DatasetAuditor: re-checks persisted output against the current rules.
 *
 * Each record is counted once under the first check it fails
 * (malformed → unknown variant → schema → domain logic); null sentinels,
 * duplicate fingerprints and stale stored fingerprints are counted
 * independently of that.
 */

import { ContractViolationError } from '../errors.js';
import type { IExampleRepository } from '../repositories/IExampleRepository.js';
import type { SchemaRegistry } from '../schemas/SchemaRegistry.js';
import type { Example, ToolName } from '../types/models.js';
import { isRecord } from '../utils/guards.js';
import { canonicalJson, computeFingerprint, stripNullFields } from './Deduplicator.js';
import type { Formatter } from './Formatter.js';
import type { Validator } from './Validator.js';

export type AuditIssueKind =
  | 'malformed'
  | 'unknown_variant'
  | 'schema'
  | 'domain_logic'
  | 'null_sentinel'
  | 'duplicate'
  | 'fingerprint_mismatch'
  | 'text_mismatch';

export interface AuditIssue {
  /** Zero-based position in storage order. */
  index: number;
  kind: AuditIssueKind;
  message: string;
}

export interface AuditReport {
  total: number;
  valid: number;
  byVariant: Record<ToolName, number>;
  counts: Record<AuditIssueKind, number>;
  issues: AuditIssue[];
}

const MAX_ISSUES = 200;

export class DatasetAuditor {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly validator: Validator,
    private readonly formatter: Formatter
  ) {}

  async audit(repository: IExampleRepository): Promise<AuditReport> {
    return this.auditRecords(await repository.loadAll());
  }

  auditRecords(records: readonly unknown[]): AuditReport {
    const report: AuditReport = {
      total: records.length,
      valid: 0,
      byVariant: { codebase_search: 0, file_manager: 0, sandbox_exec: 0, ask_human: 0 },
      counts: {
        malformed: 0,
        unknown_variant: 0,
        schema: 0,
        domain_logic: 0,
        null_sentinel: 0,
        duplicate: 0,
        fingerprint_mismatch: 0,
        text_mismatch: 0,
      },
      issues: [],
    };
    const note = (index: number, kind: AuditIssueKind, message: string) => {
      report.counts[kind]++;
      if (report.issues.length < MAX_ISSUES) report.issues.push({ index, kind, message });
    };
    const seen = new Set<string>();

    for (const [index, record] of records.entries()) {
      if (
        !isRecord(record) ||
        typeof record.query !== 'string' ||
        typeof record.reasoning !== 'string' ||
        !isRecord(record.toolCall)
      ) {
        note(index, 'malformed', 'record lacks query, reasoning or toolCall');
        continue;
      }

      const toolCall = record.toolCall;
      const variant = this.registry.get(toolCall[this.registry.discriminator]);
      if (!variant) {
        note(index, 'unknown_variant', `unregistered tool ${JSON.stringify(toolCall.tool)}`);
        continue;
      }

      let clean = true;
      const args: Record<string, unknown> = isRecord(toolCall.arguments) ? toolCall.arguments : {};
      for (const [field, sentinels] of Object.entries(variant.nullSentinels)) {
        const value = args[field];
        if (field in args && sentinels.some((sentinel) => sentinel === value)) {
          note(index, 'null_sentinel', `${variant.tag}.${field} holds ${JSON.stringify(value)}`);
          clean = false;
        }
      }

      const domain = typeof record.domain === 'string' ? record.domain : '';
      const persona = typeof record.persona === 'string' ? record.persona : '';
      const outcome = this.validator.validate(
        JSON.stringify({ query: record.query, reasoning: record.reasoning, toolCall }),
        {
          id: `audit-${index}`,
          domain,
          persona,
          variant: variant.tag,
          queryStyle: '',
          complexity: variant.complexity,
        }
      );
      if (outcome.status === 'rejected') {
        note(
          index,
          outcome.reason === 'domain_logic_violation' ? 'domain_logic' : 'schema',
          outcome.message
        );
        continue;
      }

      const fingerprint = computeFingerprint(
        outcome.example.query,
        stripNullFields(outcome.example.toolCall, this.registry)
      );
      if (typeof record.fingerprint === 'string' && record.fingerprint !== fingerprint) {
        note(index, 'fingerprint_mismatch', 'stored fingerprint does not match the content');
      }
      if (seen.has(fingerprint)) {
        note(index, 'duplicate', `fingerprint ${fingerprint.slice(0, 12)} seen before`);
        clean = false;
      }
      seen.add(fingerprint);

      if (typeof record.text === 'string' && !this.textMatches(record.text, outcome.example)) {
        note(index, 'text_mismatch', 'rendered text does not parse back to the record');
      }

      if (clean) {
        report.valid++;
        report.byVariant[variant.tag]++;
      }
    }

    return report;
  }

  /** The stored rendering parses back to the same query, reasoning and call. */
  private textMatches(text: string, example: Example): boolean {
    try {
      const parts = this.formatter.parse(text);
      return (
        parts.query === example.query &&
        parts.reasoning === example.reasoning &&
        canonicalJson(stripNullFields(parts.toolCall, this.registry)) ===
          canonicalJson(stripNullFields(example.toolCall, this.registry))
      );
    } catch (err) {
      if (err instanceof ContractViolationError) return false;
      throw err;
    }
  }
}
