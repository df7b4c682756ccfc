/**
 * Smooth weighted round-robin.
 * Deterministic: the same sequence of requests always yields the same picks,
 * and over time each backend receives traffic in proportion to its weight.
 */

import type { ISelectionStrategy, SelectionRequest } from './ISelectionStrategy.js';
import { effectiveWeight } from './ISelectionStrategy.js';

export class WeightedRotationStrategy implements ISelectionStrategy {
  private readonly current = new Map<string, number>();

  constructor(private readonly preferenceBoost = 1) {}

  select({ task, candidates }: SelectionRequest): string {
    if (candidates.length === 0) {
      throw new RangeError('No candidates to select from');
    }

    let total = 0;
    let best = candidates[0];
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const candidate of candidates) {
      const weight = effectiveWeight(candidate, task, this.preferenceBoost);
      const score = (this.current.get(candidate.id) ?? 0) + weight;
      this.current.set(candidate.id, score);
      total += weight;
      // Strict comparison: ties go to the earlier candidate in rotation.
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }

    this.current.set(best.id, bestScore - total);
    return best.id;
  }
}
