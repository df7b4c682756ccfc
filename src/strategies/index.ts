export type {
  ISelectionStrategy,
  SelectionCandidate,
  SelectionRequest,
} from './ISelectionStrategy.js';
export { effectiveWeight } from './ISelectionStrategy.js';
export { WeightedRotationStrategy } from './WeightedRotationStrategy.js';
export { SeededRouletteStrategy } from './SeededRouletteStrategy.js';
