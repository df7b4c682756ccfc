/**
 * Train/test split, stratified by variant so each tool keeps its share in
 * both halves. Seeded: the same records and seed give the same split.
 */

import { TOOL_NAMES } from '../schemas/toolCalls.js';
import type { ToolName } from '../types/models.js';
import { createRng } from '../utils/random.js';

export interface SplitOptions {
  /** Share of each variant that goes to train, in (0, 1). */
  trainRatio: number;
  seed: number;
}

export interface DatasetSplit<T> {
  train: T[];
  test: T[];
}

export function splitDataset<T extends { toolCall: { tool: ToolName } }>(
  records: readonly T[],
  options: SplitOptions
): DatasetSplit<T> {
  if (!(options.trainRatio > 0 && options.trainRatio < 1)) {
    throw new RangeError(`trainRatio must be between 0 and 1, got ${options.trainRatio}`);
  }

  const rng = createRng(options.seed);
  const split: DatasetSplit<T> = { train: [], test: [] };

  for (const tag of TOOL_NAMES) {
    const group = rng.shuffle(records.filter((record) => record.toolCall.tool === tag));
    const trainCount = Math.round(group.length * options.trainRatio);
    split.train.push(...group.slice(0, trainCount));
    split.test.push(...group.slice(trainCount));
  }
  return split;
}
