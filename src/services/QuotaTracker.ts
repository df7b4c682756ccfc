/**
 * QuotaTracker: decides what the next task asks for.
 *
 * Variant targets come from the configured weights (largest remainder over
 * targetTotal). Slots are reserved while a task is in flight so concurrent
 * workers never overshoot a variant; a discarded task releases its slot.
 */

import type { QueryStyle } from '../config.js';
import type { SchemaRegistry } from '../schemas/SchemaRegistry.js';
import { TOOL_NAMES } from '../schemas/toolCalls.js';
import type { GenerationTask, ToolName } from '../types/models.js';
import type { Rng } from '../utils/random.js';

export type VariantCounts = Record<ToolName, number>;

export interface Coverage {
  variants: VariantCounts;
  domains: Record<string, number>;
  personas: Record<string, number>;
}

export interface QuotaOptions {
  targetTotal: number;
  weights: Partial<Record<ToolName, number>>;
  domains: readonly string[];
  personas: readonly string[];
  queryStyles: readonly QueryStyle[];
}

function zeroCounts(): VariantCounts {
  return { codebase_search: 0, file_manager: 0, sandbox_exec: 0, ask_human: 0 };
}

/** Split `total` by weight; leftover units go to the largest fractional parts. */
export function allocateTargets(
  total: number,
  weights: Partial<Record<ToolName, number>>
): VariantCounts {
  const targets = zeroCounts();
  const sum = TOOL_NAMES.reduce((acc, tag) => acc + (weights[tag] ?? 0), 0);
  if (sum <= 0 || total <= 0) return targets;

  const fractions: { tag: ToolName; fraction: number }[] = [];
  let assigned = 0;
  for (const tag of TOOL_NAMES) {
    const exact = (total * (weights[tag] ?? 0)) / sum;
    targets[tag] = Math.floor(exact);
    assigned += targets[tag];
    fractions.push({ tag, fraction: exact - targets[tag] });
  }

  // Stable sort keeps declaration order among equal fractions.
  fractions.sort((a, b) => b.fraction - a.fraction);
  for (let i = 0; i < total - assigned; i++) {
    targets[fractions[i % fractions.length].tag]++;
  }
  return targets;
}

function increment(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

export class QuotaTracker {
  readonly targets: Readonly<VariantCounts>;
  private readonly accepted = zeroCounts();
  private readonly inFlight = zeroCounts();
  /** Reservations plus acceptances per domain/persona; drives spreading. */
  private readonly domainLoad = new Map<string, number>();
  private readonly personaLoad = new Map<string, number>();
  private readonly domainCoverage = new Map<string, number>();
  private readonly personaCoverage = new Map<string, number>();
  private nextId = 1;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly options: QuotaOptions,
    private readonly rng: Rng
  ) {
    this.targets = allocateTargets(options.targetTotal, options.weights);
  }

  /** Reserve a slot and describe the task for it; undefined when every slot is taken. */
  reserve(): GenerationTask | undefined {
    let variant: ToolName | undefined;
    let largest = 0;
    for (const tag of TOOL_NAMES) {
      const open = this.targets[tag] - this.accepted[tag] - this.inFlight[tag];
      if (open > largest) {
        variant = tag;
        largest = open;
      }
    }
    if (!variant) return undefined;

    const domain = this.leastLoaded(this.options.domains, this.domainLoad);
    const persona = this.leastLoaded(this.options.personas, this.personaLoad);
    const style = this.rng.pick(this.options.queryStyles);

    this.inFlight[variant]++;
    increment(this.domainLoad, domain);
    increment(this.personaLoad, persona);

    return {
      id: `task-${this.nextId++}`,
      domain,
      persona,
      variant,
      queryStyle: `${style.name}: ${style.description}`,
      complexity: this.registry.require(variant).complexity,
    };
  }

  /** The task produced a persisted example. */
  commit(task: GenerationTask): void {
    this.inFlight[task.variant]--;
    this.accepted[task.variant]++;
    increment(this.domainCoverage, task.domain);
    increment(this.personaCoverage, task.persona);
  }

  /** The task ended without an example; its slot opens again. */
  release(task: GenerationTask): void {
    this.inFlight[task.variant]--;
    increment(this.domainLoad, task.domain, -1);
    increment(this.personaLoad, task.persona, -1);
  }

  /** Count an example produced outside this tracker (resumed output). */
  credit(variant: ToolName, domain: string, persona: string): void {
    this.accepted[variant]++;
    increment(this.domainCoverage, domain);
    increment(this.personaCoverage, persona);
    increment(this.domainLoad, domain);
    increment(this.personaLoad, persona);
  }

  isComplete(): boolean {
    return TOOL_NAMES.every((tag) => this.accepted[tag] >= this.targets[tag]);
  }

  get acceptedTotal(): number {
    return TOOL_NAMES.reduce((sum, tag) => sum + this.accepted[tag], 0);
  }

  get inFlightTotal(): number {
    return TOOL_NAMES.reduce((sum, tag) => sum + this.inFlight[tag], 0);
  }

  shortfall(): VariantCounts {
    const gaps = zeroCounts();
    for (const tag of TOOL_NAMES) {
      gaps[tag] = Math.max(this.targets[tag] - this.accepted[tag], 0);
    }
    return gaps;
  }

  coverage(): Coverage {
    return {
      variants: { ...this.accepted },
      domains: Object.fromEntries(this.domainCoverage),
      personas: Object.fromEntries(this.personaCoverage),
    };
  }

  // ── Private ──

  private leastLoaded(items: readonly string[], load: Map<string, number>): string {
    let min = Number.POSITIVE_INFINITY;
    let candidates: string[] = [];
    for (const item of items) {
      const value = load.get(item) ?? 0;
      if (value < min) {
        min = value;
        candidates = [item];
      } else if (value === min) {
        candidates.push(item);
      }
    }
    return this.rng.pick(candidates);
  }
}
