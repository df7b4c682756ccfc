/**
 * PipelineOrchestrator: drives tasks through
 *   pool → generator → validator → deduplicator → formatter → repository
 * with bounded parallelism, until quotas fill or the run has to stop.
 *
 * Per-attempt states:
 *   requested → generated → (validated | rejected)
 *             → (deduplicated | rejected_duplicate) → formatted → persisted
 * A backend failure goes straight from requested to rejected.
 */

import pLimit from 'p-limit';
import type { PipelineConfig } from '../config.js';
import {
  AppError,
  BackendError,
  BackendsUnavailableError,
  ContractViolationError,
  PersistenceError,
  type BackendErrorKind,
} from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IExampleRepository } from '../repositories/IExampleRepository.js';
import type { SchemaRegistry } from '../schemas/SchemaRegistry.js';
import type { GenerationTask, RejectionReason } from '../types/models.js';
import { isRecord } from '../utils/guards.js';
import { createRng } from '../utils/random.js';
import type { BackendLease, BackendOutcome, BackendPool, BackendStatus } from './BackendPool.js';
import type { Deduplicator } from './Deduplicator.js';
import type { Formatter } from './Formatter.js';
import type { Generator } from './Generator.js';
import { QuotaTracker, type Coverage, type VariantCounts } from './QuotaTracker.js';
import { RunStatistics, type FailureKind } from './RunStatistics.js';
import type { Validator } from './Validator.js';

// ── Attempt state machine ──

export type AttemptState =
  | 'requested'
  | 'generated'
  | 'validated'
  | 'rejected'
  | 'deduplicated'
  | 'rejected_duplicate'
  | 'formatted'
  | 'persisted';

const TRANSITIONS: Record<AttemptState, readonly AttemptState[]> = {
  requested: ['generated', 'rejected'],
  generated: ['validated', 'rejected'],
  validated: ['deduplicated', 'rejected_duplicate'],
  deduplicated: ['formatted'],
  formatted: ['persisted'],
  rejected: [],
  rejected_duplicate: [],
  persisted: [],
};

export class Attempt {
  private current: AttemptState = 'requested';

  constructor(readonly taskId: string) {}

  get state(): AttemptState {
    return this.current;
  }

  advance(next: AttemptState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new ContractViolationError(
        `Illegal attempt transition ${this.current} → ${next} for ${this.taskId}`
      );
    }
    this.current = next;
  }
}

// ── Report ──

export type TerminationReason =
  | 'quota_filled'
  | 'attempt_ceiling'
  | 'cancelled'
  | 'backends_unavailable'
  | 'persistence_failed';

export interface RunReport {
  terminatedBy: TerminationReason;
  /** Examples persisted by this run. */
  accepted: number;
  /** Examples found in storage at start and counted toward the targets. */
  resumed: number;
  attempts: number;
  targets: VariantCounts;
  shortfall: VariantCounts;
  coverage: Coverage;
  rejections: Record<RejectionReason, number>;
  duplicates: number;
  backendErrors: Record<BackendErrorKind, number>;
  exhausted: Partial<Record<FailureKind, number>>;
  warnings: number;
  durationMs: number;
  backends: BackendStatus[];
  error?: { code: string; message: string };
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface OrchestratorDeps {
  config: PipelineConfig;
  registry: SchemaRegistry;
  pool: BackendPool;
  generator: Generator;
  validator: Validator;
  deduplicator: Deduplicator;
  formatter: Formatter;
  repository: IExampleRepository;
  logProvider: ILogProvider;
  clock?: () => number;
}

function outcomeFor(error: BackendError): BackendOutcome {
  switch (error.kind) {
    case 'rate_limit':
      return error.retryAfterMs !== undefined
        ? { type: 'rate_limited', retryAfterMs: error.retryAfterMs }
        : { type: 'rate_limited' };
    case 'auth':
      return { type: 'auth_failure' };
    default:
      return { type: 'failure' };
  }
}

/** Mutable state shared by the workers of one run. */
interface RunState {
  stats: RunStatistics;
  quota: QuotaTracker;
  controller: AbortController;
  stop: TerminationReason | 'defect' | null;
  error: Error | null;
}

export class PipelineOrchestrator {
  private readonly clock: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    const { config, logProvider } = this.deps;
    const started = this.clock();
    const run: RunState = {
      stats: new RunStatistics(),
      quota: new QuotaTracker(
        this.deps.registry,
        {
          targetTotal: config.targetTotal,
          weights: config.variants,
          domains: config.domains,
          personas: config.personas,
          queryStyles: config.queryStyles,
        },
        createRng(config.seed)
      ),
      controller: new AbortController(),
      stop: null,
      error: null,
    };

    const cancel = () => this.halt(run, 'cancelled');
    if (options.signal?.aborted) cancel();
    options.signal?.addEventListener('abort', cancel, { once: true });

    logProvider.info('Run started', {
      targetTotal: config.targetTotal,
      concurrency: config.concurrency,
      backends: this.deps.pool.size,
      seed: config.seed,
    });

    try {
      if (run.stop === null) await this.prepare(run);
      if (run.stop === null) await this.drive(run);
    } finally {
      options.signal?.removeEventListener('abort', cancel);
    }

    if (run.stop === 'defect' && run.error) {
      logProvider.error('Run aborted by an unexpected error', { error: run.error.message });
      await logProvider.flush();
      throw run.error;
    }

    const report = this.buildReport(run, started);
    logProvider.info('Run finished', {
      terminatedBy: report.terminatedBy,
      accepted: report.accepted,
      attempts: report.attempts,
      durationMs: report.durationMs,
    });
    await logProvider.flush();
    return report;
  }

  // ── Run phases ──

  /** Reset dedup state and, when resuming, count what storage already holds. */
  private async prepare(run: RunState): Promise<void> {
    const { config, deduplicator, repository, registry } = this.deps;
    deduplicator.reset();
    if (!config.resume) return;

    let existing: unknown[];
    try {
      existing = await repository.loadAll();
    } catch (err) {
      if (err instanceof PersistenceError) {
        this.halt(run, 'persistence_failed', err);
        return;
      }
      throw err;
    }

    deduplicator.seed(existing);
    for (const record of existing) {
      if (!isRecord(record) || !isRecord(record.toolCall)) continue;
      const variant = registry.get(record.toolCall[registry.discriminator]);
      if (!variant || typeof record.domain !== 'string' || typeof record.persona !== 'string') continue;
      run.quota.credit(variant.tag, record.domain, record.persona);
      run.stats.resumed++;
    }
    if (run.stats.resumed > 0) {
      this.deps.logProvider.info('Resumed from existing output', { records: run.stats.resumed });
    }
  }

  private async drive(run: RunState): Promise<void> {
    const { config } = this.deps;
    const limit = pLimit(config.concurrency);
    const running = new Set<Promise<void>>();

    const schedule = (): void => {
      while (run.stop === null) {
        if (run.quota.isComplete()) {
          this.halt(run, 'quota_filled');
          return;
        }
        // Past the ceiling nothing new starts; attempts already claimed finish.
        if (run.stats.attempts >= config.globalAttemptCeiling) return;
        if (run.quota.inFlightTotal >= config.concurrency) return;

        const task = run.quota.reserve();
        if (!task) return;

        const worker: Promise<void> = limit(() => this.runTask(task, run))
          .catch((err: unknown) => {
            this.halt(run, 'defect', err instanceof Error ? err : new Error(String(err)));
          })
          .finally(() => {
            running.delete(worker);
            schedule();
          });
        running.add(worker);
      }
    };

    schedule();
    while (running.size > 0) {
      await Promise.allSettled([...running]);
    }
    if (run.stop === null) {
      this.halt(run, run.quota.isComplete() ? 'quota_filled' : 'attempt_ceiling');
    }
  }

  // ── One task ──

  private async runTask(task: GenerationTask, run: RunState): Promise<void> {
    const { pool, generator, validator, deduplicator, formatter, repository, logProvider } =
      this.deps;
    const signal = run.controller.signal;
    let previous: string | undefined;
    let lastFailure: FailureKind | undefined;

    for (let attemptNo = 1; attemptNo <= this.deps.config.attemptBudget; attemptNo++) {
      if (run.stop !== null || !this.claimAttempt(run)) {
        run.quota.release(task);
        return;
      }
      const attempt = new Attempt(task.id);

      let lease: BackendLease;
      try {
        lease = await pool.acquire(task, { previous, signal });
      } catch (err) {
        run.quota.release(task);
        if (err instanceof BackendsUnavailableError) {
          this.halt(run, 'backends_unavailable', err);
          return;
        }
        if (run.stop !== null) return;
        throw err;
      }

      const result = await generator.generate(task, lease, signal);
      if (run.stop !== null) {
        run.quota.release(task);
        return;
      }

      if (!result.ok) {
        attempt.advance('rejected');
        run.stats.recordBackendError(result.error.kind);
        pool.report(lease.id, outcomeFor(result.error));
        lastFailure = result.error.kind;
        previous = lease.id;
        continue;
      }
      attempt.advance('generated');

      const outcome = validator.validate(result.raw, task);
      if (outcome.status === 'rejected') {
        attempt.advance('rejected');
        run.stats.recordRejection(outcome.reason);
        pool.report(lease.id, { type: 'invalid_output' });
        lastFailure = outcome.reason;
        // Structural failures move on to the next backend; logic slips get a fresh pick.
        previous = outcome.reason === 'domain_logic_violation' ? undefined : lease.id;
        logProvider.debug('Attempt rejected', {
          taskId: task.id,
          backendId: lease.id,
          reason: outcome.reason,
          message: outcome.message,
        });
        continue;
      }
      pool.report(lease.id, { type: 'success' });
      attempt.advance('validated');
      run.stats.warnings += outcome.warnings.length;

      const admission = deduplicator.admit(outcome.example);
      if (!admission.admitted) {
        attempt.advance('rejected_duplicate');
        run.stats.duplicates++;
        run.quota.release(task);
        return;
      }
      attempt.advance('deduplicated');

      let text: string;
      try {
        text = formatter.render(admission.example);
      } catch (err) {
        deduplicator.forget(admission.fingerprint);
        run.quota.release(task);
        throw err;
      }
      attempt.advance('formatted');

      try {
        await repository.append({ ...admission.example, fingerprint: admission.fingerprint, text });
      } catch (err) {
        deduplicator.forget(admission.fingerprint);
        run.quota.release(task);
        if (err instanceof PersistenceError) {
          this.halt(run, 'persistence_failed', err);
          return;
        }
        throw err;
      }
      attempt.advance('persisted');
      run.quota.commit(task);
      run.stats.accepted++;
      return;
    }

    run.quota.release(task);
    if (lastFailure !== undefined) run.stats.recordExhausted(lastFailure);
    logProvider.warn('Task exhausted its attempt budget', {
      taskId: task.id,
      variant: task.variant,
      lastFailure,
    });
  }

  // ── Helpers ──

  /** Take one attempt from the global ceiling; false once it is spent. */
  private claimAttempt(run: RunState): boolean {
    if (run.stats.attempts >= this.deps.config.globalAttemptCeiling) return false;
    run.stats.attempts++;
    return true;
  }

  /** First stop reason wins; in-flight requests are aborted. */
  private halt(run: RunState, reason: TerminationReason | 'defect', error?: Error): void {
    if (run.stop !== null) return;
    run.stop = reason;
    run.error = error ?? null;
    if (error) {
      this.deps.logProvider.error(`Run halting: ${reason}`, { error: error.message });
    }
    run.controller.abort();
  }

  private buildReport(run: RunState, started: number): RunReport {
    const terminatedBy: TerminationReason =
      run.stop === null || run.stop === 'defect' ? 'quota_filled' : run.stop;
    const error = run.error;

    return {
      terminatedBy,
      accepted: run.stats.accepted,
      resumed: run.stats.resumed,
      attempts: run.stats.attempts,
      targets: { ...run.quota.targets },
      shortfall: run.quota.shortfall(),
      coverage: run.quota.coverage(),
      rejections: { ...run.stats.rejections },
      duplicates: run.stats.duplicates,
      backendErrors: { ...run.stats.backendErrors },
      exhausted: { ...run.stats.exhausted },
      warnings: run.stats.warnings,
      durationMs: this.clock() - started,
      backends: this.deps.pool.snapshot(),
      ...(error && {
        error: {
          code: error instanceof AppError ? error.code : error.name,
          message: error.message,
        },
      }),
    };
  }
}
