/**
 * Weighted random selection driven by a seeded generator.
 */

import type { ISelectionStrategy, SelectionRequest } from './ISelectionStrategy.js';
import { effectiveWeight } from './ISelectionStrategy.js';
import { createRng, type Rng } from '../utils/random.js';

export class SeededRouletteStrategy implements ISelectionStrategy {
  private readonly rng: Rng;

  constructor(
    seed: number,
    private readonly preferenceBoost = 1
  ) {
    this.rng = createRng(seed);
  }

  select({ task, candidates }: SelectionRequest): string {
    if (candidates.length === 0) {
      throw new RangeError('No candidates to select from');
    }

    const weights = candidates.map((c) => effectiveWeight(c, task, this.preferenceBoost));
    const total = weights.reduce((sum, w) => sum + w, 0);
    let ticket = this.rng.next() * total;

    for (const [index, candidate] of candidates.entries()) {
      ticket -= weights[index];
      if (ticket < 0) return candidate.id;
    }
    return candidates[candidates.length - 1].id;
  }
}
