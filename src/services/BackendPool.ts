/**
 * BackendPool: ordered rotation of generation backends with health tracking.
 *
 * State per backend:
 *   ready        → selectable now
 *   cooling      → rate-limited until `cooldownUntil`
 *   unavailable  → repeated credential failures; never selected again
 *
 * Repeated generic failures demote a backend to the back of the rotation
 * instead of removing it.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { BackendsUnavailableError } from '../errors.js';
import type { IGenerationBackend } from '../providers/IGenerationBackend.js';
import type { ISelectionStrategy } from '../strategies/ISelectionStrategy.js';
import type { BackendTag, GenerationTask } from '../types/models.js';

export interface PoolMember {
  id: string;
  model: string;
  backend: IGenerationBackend;
  weight: number;
  tags: readonly BackendTag[];
  /** Per-backend sampling temperature, overriding the run default. */
  temperature?: number;
}

/** What the pool hands out: enough to make one call and report back. */
export interface BackendLease {
  id: string;
  model: string;
  backend: IGenerationBackend;
  temperature?: number;
}

export type BackendOutcome =
  | { type: 'success' }
  | { type: 'rate_limited'; retryAfterMs?: number }
  | { type: 'failure' }
  | { type: 'auth_failure' }
  | { type: 'invalid_output' };

export type BackendState = 'ready' | 'cooling' | 'unavailable';

export interface BackendStatus {
  id: string;
  model: string;
  state: BackendState;
  /** Position in the rotation, 0 first. */
  position: number;
  cooldownUntil: number | null;
  consecutiveFailures: number;
  successes: number;
  failures: number;
  rateLimits: number;
  authFailures: number;
  invalidOutputs: number;
  demotions: number;
}

export interface BackendPoolOptions {
  cooldownMs: number;
  demoteAfterFailures: number;
  /** Consecutive auth failures before removal; at least 2. */
  authFailureLimit: number;
  /** Millisecond clock. Default: Date.now. */
  clock?: () => number;
  /** Wait used while every live backend is cooling down. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface AcquireOptions {
  /** Backend that just failed this task; failover continues after it. */
  previous?: string;
  signal?: AbortSignal;
}

interface Slot {
  member: PoolMember;
  cooldownUntil: number;
  unavailable: boolean;
  consecutiveFailures: number;
  consecutiveAuthFailures: number;
  successes: number;
  failures: number;
  rateLimits: number;
  authFailures: number;
  invalidOutputs: number;
  demotions: number;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

export class BackendPool {
  /** Rotation order; demotion moves a slot to the end. */
  private order: Slot[];
  private readonly clock: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    members: readonly PoolMember[],
    private readonly strategy: ISelectionStrategy,
    private readonly options: BackendPoolOptions
  ) {
    if (options.authFailureLimit < 2) {
      throw new RangeError(`authFailureLimit must be at least 2, got ${options.authFailureLimit}`);
    }
    const ids = new Set<string>();
    for (const member of members) {
      if (ids.has(member.id)) throw new Error(`Duplicate backend id "${member.id}"`);
      ids.add(member.id);
    }

    this.order = members.map((member) => ({
      member,
      cooldownUntil: 0,
      unavailable: false,
      consecutiveFailures: 0,
      consecutiveAuthFailures: 0,
      successes: 0,
      failures: 0,
      rateLimits: 0,
      authFailures: 0,
      invalidOutputs: 0,
      demotions: 0,
    }));
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Pick a backend for the task.
   * Waits while every live backend is cooling down; throws
   * BackendsUnavailableError once none is live.
   */
  async acquire(task: GenerationTask, options: AcquireOptions = {}): Promise<BackendLease> {
    for (;;) {
      const live = this.order.filter((slot) => !slot.unavailable);
      if (live.length === 0) {
        throw new BackendsUnavailableError(this.order.map((slot) => slot.member.id));
      }

      const now = this.clock();
      const ready = live.filter((slot) => slot.cooldownUntil <= now);
      if (ready.length > 0) {
        return this.toLease(this.choose(task, ready, options.previous));
      }

      const wakeAt = Math.min(...live.map((slot) => slot.cooldownUntil));
      await this.sleep(Math.max(wakeAt - now, 0), options.signal);
    }
  }

  report(id: string, outcome: BackendOutcome): void {
    const slot = this.order.find((s) => s.member.id === id);
    if (!slot) throw new RangeError(`Unknown backend "${id}"`);

    switch (outcome.type) {
      case 'success':
        slot.successes++;
        slot.consecutiveFailures = 0;
        slot.consecutiveAuthFailures = 0;
        break;

      case 'rate_limited':
        slot.rateLimits++;
        slot.cooldownUntil = this.clock() + (outcome.retryAfterMs ?? this.options.cooldownMs);
        break;

      case 'failure':
        slot.failures++;
        slot.consecutiveFailures++;
        if (slot.consecutiveFailures >= this.options.demoteAfterFailures) {
          slot.consecutiveFailures = 0;
          slot.demotions++;
          this.order = [...this.order.filter((s) => s !== slot), slot];
        }
        break;

      case 'auth_failure':
        slot.authFailures++;
        slot.consecutiveAuthFailures++;
        if (slot.consecutiveAuthFailures >= this.options.authFailureLimit) {
          slot.unavailable = true;
        }
        break;

      case 'invalid_output':
        slot.invalidOutputs++;
        break;
    }
  }

  snapshot(): BackendStatus[] {
    const now = this.clock();
    return this.order.map((slot, position): BackendStatus => ({
      id: slot.member.id,
      model: slot.member.model,
      state: slot.unavailable ? 'unavailable' : slot.cooldownUntil > now ? 'cooling' : 'ready',
      position,
      cooldownUntil: slot.cooldownUntil > now ? slot.cooldownUntil : null,
      consecutiveFailures: slot.consecutiveFailures,
      successes: slot.successes,
      failures: slot.failures,
      rateLimits: slot.rateLimits,
      authFailures: slot.authFailures,
      invalidOutputs: slot.invalidOutputs,
      demotions: slot.demotions,
    }));
  }

  // ── Private ──

  private choose(task: GenerationTask, ready: Slot[], previous: string | undefined): Slot {
    if (previous !== undefined) {
      const next = this.nextAfter(previous, ready);
      if (next) return next;
    }

    const id = this.strategy.select({
      task,
      candidates: ready.map((slot) => ({
        id: slot.member.id,
        weight: slot.member.weight,
        tags: slot.member.tags,
      })),
    });
    const chosen = ready.find((slot) => slot.member.id === id);
    if (!chosen) throw new Error(`Selection strategy returned unknown backend "${id}"`);
    return chosen;
  }

  /**
   * Next ready slot after `previous` in rotation order, wrapping around.
   * Falls back to `previous` itself only when it is the sole ready backend.
   */
  private nextAfter(previous: string, ready: Slot[]): Slot | undefined {
    const start = this.order.findIndex((slot) => slot.member.id === previous);
    if (start === -1) return undefined;

    for (let step = 1; step <= this.order.length; step++) {
      const slot = this.order[(start + step) % this.order.length];
      if (ready.includes(slot)) return slot;
    }
    return undefined;
  }

  private toLease(slot: Slot): BackendLease {
    const { id, model, backend, temperature } = slot.member;
    return temperature !== undefined ? { id, model, backend, temperature } : { id, model, backend };
  }
}
