import { describe, expect, it } from 'vitest';
import { balanceClusters, clusterMembers, kMeans } from './kmeans';
import { createSeededRandom } from './random';

const points = [
  { x: -100, y: 0 },
  { x: -98, y: 0 },
  { x: -96, y: 0 },
  { x: -94, y: 0 },
  { x: 100, y: 0 },
];

describe('kMeans', () => {
  it('separates distant groups', () => {
    const result = kMeans(points, { k: 2, maxIterations: 50, random: createSeededRandom(42) });
    const members = clusterMembers(result.assignments, 2).sort((a, b) => a.length - b.length);

    expect(members).toEqual([[4], [0, 1, 2, 3]]);
  });

  it('is reproducible for a fixed seed', () => {
    const a = kMeans(points, { k: 2, maxIterations: 50, random: createSeededRandom(7) });
    const b = kMeans(points, { k: 2, maxIterations: 50, random: createSeededRandom(7) });
    expect(a).toEqual(b);
  });

  it('caps k at the number of points', () => {
    const result = kMeans(points.slice(0, 2), { k: 5, maxIterations: 10, random: createSeededRandom(1) });
    expect(result.centers).toHaveLength(2);
  });
});

describe('balanceClusters', () => {
  it('moves the member nearest the small cluster until sizes differ by one', () => {
    const centers = [
      { x: -97, y: 0 },
      { x: 100, y: 0 },
    ];
    const balanced = balanceClusters(points, [0, 0, 0, 0, 1], centers);
    expect(balanced).toEqual([0, 0, 0, 1, 1]);
  });

  it('leaves already even clusters alone', () => {
    const centers = [
      { x: -99, y: 0 },
      { x: 2, y: 0 },
    ];
    expect(balanceClusters(points, [0, 0, 1, 1, 1], centers)).toEqual([0, 0, 1, 1, 1]);
  });
});
