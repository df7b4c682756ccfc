/**
 * Backend selection strategy interface.
 * The pool hands a strategy the backends that are ready right now; the
 * strategy only decides among them and never sees cooling or dead ones.
 */

import type { BackendTag, GenerationTask } from '../types/models.js';

export interface SelectionCandidate {
  id: string;
  weight: number;
  tags: readonly BackendTag[];
}

export interface SelectionRequest {
  task: GenerationTask;
  /** Ready backends in rotation order. Never empty. */
  candidates: readonly SelectionCandidate[];
}

export interface ISelectionStrategy {
  /** Return the id of one of the candidates. */
  select(request: SelectionRequest): string;
}

/**
 * Weight a candidate for a task: logic-strong backends are preferred for
 * complex tasks, the rest for simple ones.
 */
export function effectiveWeight(
  candidate: SelectionCandidate,
  task: GenerationTask,
  preferenceBoost: number
): number {
  const logicStrong = candidate.tags.includes('logic-strong');
  const preferred = task.complexity === 'complex' ? logicStrong : !logicStrong;
  return preferred ? candidate.weight * preferenceBoost : candidate.weight;
}
