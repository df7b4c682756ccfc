import { describe, it, expect } from 'vitest';
import { WeightedRotationStrategy } from '../../src/strategies/WeightedRotationStrategy.js';
import { effectiveWeight, type SelectionCandidate } from '../../src/strategies/ISelectionStrategy.js';
import { makeTask } from '../mocks/fixtures.js';

function candidate(id: string, weight = 1, tags: SelectionCandidate['tags'] = ['diversity']): SelectionCandidate {
  return { id, weight, tags };
}

describe('effectiveWeight', () => {
  const strong = candidate('strong', 2, ['logic-strong']);
  const diverse = candidate('diverse', 2, ['diversity']);

  it('should boost logic-strong backends for complex tasks', () => {
    const task = makeTask({ complexity: 'complex' });
    expect(effectiveWeight(strong, task, 3)).toBe(6);
    expect(effectiveWeight(diverse, task, 3)).toBe(2);
  });

  it('should boost the other backends for simple tasks', () => {
    const task = makeTask({ complexity: 'simple' });
    expect(effectiveWeight(strong, task, 3)).toBe(2);
    expect(effectiveWeight(diverse, task, 3)).toBe(6);
  });
});

describe('WeightedRotationStrategy', () => {
  it('should alternate between equally weighted backends', () => {
    const strategy = new WeightedRotationStrategy();
    const candidates = [candidate('a'), candidate('b')];
    const picks = Array.from({ length: 4 }, () => strategy.select({ task: makeTask(), candidates }));
    expect(picks).toEqual(['a', 'b', 'a', 'b']);
  });

  it('should spread picks smoothly in proportion to weight', () => {
    const strategy = new WeightedRotationStrategy();
    const candidates = [candidate('a', 2), candidate('b', 1)];
    const picks = Array.from({ length: 6 }, () => strategy.select({ task: makeTask(), candidates }));
    expect(picks).toEqual(['a', 'b', 'a', 'a', 'b', 'a']);
  });

  it('should prefer logic-strong backends for complex tasks', () => {
    const strategy = new WeightedRotationStrategy(3);
    const candidates = [candidate('strong', 1, ['logic-strong']), candidate('diverse')];
    const task = makeTask({ complexity: 'complex' });
    const picks = Array.from({ length: 4 }, () => strategy.select({ task, candidates }));
    expect(picks).toEqual(['strong', 'strong', 'diverse', 'strong']);
  });

  it('should throw when there is nothing to choose from', () => {
    expect(() => new WeightedRotationStrategy().select({ task: makeTask(), candidates: [] })).toThrow(
      RangeError
    );
  });
});
