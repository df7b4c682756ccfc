/**
 * Aggregate counters for one pipeline run.
 * Discarded records are never kept; only these counts survive.
 */

import type { BackendErrorKind } from '../errors.js';
import type { RejectionReason } from '../types/models.js';

/** What made a task give up: its last rejection reason or backend error kind. */
export type FailureKind = RejectionReason | BackendErrorKind;

export class RunStatistics {
  attempts = 0;
  accepted = 0;
  resumed = 0;
  duplicates = 0;
  warnings = 0;
  readonly rejections: Record<RejectionReason, number> = {
    schema_mismatch: 0,
    discriminator_ambiguous: 0,
    domain_logic_violation: 0,
  };
  readonly backendErrors: Record<BackendErrorKind, number> = {
    timeout: 0,
    rate_limit: 0,
    network: 0,
    malformed: 0,
    auth: 0,
  };
  readonly exhausted: Partial<Record<FailureKind, number>> = {};

  recordRejection(reason: RejectionReason): void {
    this.rejections[reason]++;
  }

  recordBackendError(kind: BackendErrorKind): void {
    this.backendErrors[kind]++;
  }

  recordExhausted(lastFailure: FailureKind): void {
    this.exhausted[lastFailure] = (this.exhausted[lastFailure] ?? 0) + 1;
  }

  get exhaustedTotal(): number {
    return Object.values(this.exhausted).reduce((sum, n) => sum + (n ?? 0), 0);
  }
}
