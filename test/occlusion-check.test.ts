import { describe, it, expect } from 'vitest';
import { OcclusionConsistencyCheck } from '../src/lib/checks/occlusion';
import { resolveConfig } from '../src/lib/config';
import { makeAnnotation, makeTask } from './helpers';

const check = (overrides: Parameters<typeof resolveConfig>[0] = {}) =>
  new OcclusionConsistencyCheck(resolveConfig(overrides));

describe('OcclusionConsistencyCheck', () => {
  const first = makeAnnotation({ id: 'a', left: 0, top: 0, width: 10, height: 10 });
  const second = makeAnnotation({ id: 'b', left: 2, top: 2, width: 10, height: 10 });

  it('flags overlapping boxes that both claim 0% occlusion', async () => {
    const issues = await check().evaluate(makeTask([first, second]));
    expect(issues).toEqual([
      {
        type: 'occlusion',
        severity: 10,
        annotations: ['a', 'b'],
        task: 'task-1',
        explanation: 'Potential for occlusion yet marked as 0%',
      },
    ]);
  });

  it('respects the threshold', async () => {
    // 72.7% overlap
    expect(await check({ occlusionThreshold: 90 }).evaluate(makeTask([first, second]))).toEqual([]);
    expect(await check({ occlusionThreshold: 72 }).evaluate(makeTask([first, second]))).toHaveLength(1);
  });

  it('uses the axis-average proxy rather than box coverage', async () => {
    // Half of each box overlaps, but the proxy gives 35.7%
    const shifted = makeAnnotation({ id: 'c', left: 5, top: 5, width: 10, height: 10 });
    expect(await check().evaluate(makeTask([first, shifted]))).toEqual([]);
    expect(await check({ occlusionThreshold: 35 }).evaluate(makeTask([first, shifted]))).toHaveLength(1);
  });

  it('ignores pairs unless both claim exactly 0%', async () => {
    const occluded = makeAnnotation({ id: 'b', left: 2, top: 2, width: 10, height: 10, occlusion: '25%' });
    expect(await check().evaluate(makeTask([first, occluded]))).toEqual([]);
  });

  it('never flags boxes that do not overlap', async () => {
    const far = makeAnnotation({ id: 'far', left: 100, top: 100, width: 5, height: 5 });
    const near = makeAnnotation({ id: 'near', left: 0, top: 0, width: 5, height: 5 });
    expect(await check({ occlusionThreshold: 0 }).evaluate(makeTask([near, far]))).toEqual([]);
  });

  it('reports each pair twice in ordered mode', async () => {
    const issues = await check({ occlusionPairMode: 'ordered' }).evaluate(makeTask([first, second]));
    expect(issues.map((issue) => issue.annotations)).toEqual([
      ['a', 'b'],
      ['b', 'a'],
    ]);
  });

  it('skips pairs with degenerate geometry', async () => {
    const flat = makeAnnotation({ id: 'flat', left: 2, top: 2, width: 10, height: 0 });
    expect(await check({ occlusionThreshold: 0 }).evaluate(makeTask([first, flat]))).toEqual([]);
  });

  it('walks pairs in annotation order', async () => {
    const third = makeAnnotation({ id: 'c', left: 1, top: 1, width: 10, height: 10 });
    const issues = await check().evaluate(makeTask([first, second, third]));
    expect(issues.map((issue) => issue.annotations)).toEqual([
      ['a', 'b'],
      ['a', 'c'],
      ['b', 'c'],
    ]);
  });
});
