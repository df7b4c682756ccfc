import { describe, it, expect } from 'vitest';
import { splitDataset } from '../../src/services/DatasetSplitter.js';
import type { ToolName } from '../../src/types/models.js';

function records(tool: ToolName, count: number, offset = 0) {
  return Array.from({ length: count }, (_, i) => ({ id: offset + i, toolCall: { tool } }));
}

const dataset = [...records('codebase_search', 10), ...records('file_manager', 4, 100)];

describe('splitDataset', () => {
  it('should split each variant by the ratio', () => {
    const { train, test } = splitDataset(dataset, { trainRatio: 0.75, seed: 1 });

    expect(train.filter((r) => r.toolCall.tool === 'codebase_search')).toHaveLength(8);
    expect(test.filter((r) => r.toolCall.tool === 'codebase_search')).toHaveLength(2);
    expect(train.filter((r) => r.toolCall.tool === 'file_manager')).toHaveLength(3);
    expect(test.filter((r) => r.toolCall.tool === 'file_manager')).toHaveLength(1);
  });

  it('should place every record exactly once', () => {
    const { train, test } = splitDataset(dataset, { trainRatio: 0.5, seed: 4 });
    const ids = [...train, ...test].map((r) => r.id).sort((a, b) => a - b);
    expect(ids).toEqual(dataset.map((r) => r.id));
  });

  it('should be reproducible from the seed', () => {
    expect(splitDataset(dataset, { trainRatio: 0.9, seed: 42 })).toEqual(
      splitDataset(dataset, { trainRatio: 0.9, seed: 42 })
    );
  });

  it('should reject ratios outside (0, 1)', () => {
    expect(() => splitDataset(dataset, { trainRatio: 1, seed: 1 })).toThrow(RangeError);
    expect(() => splitDataset(dataset, { trainRatio: 0, seed: 1 })).toThrow(RangeError);
  });
});
