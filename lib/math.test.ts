import { describe, it, expect } from 'vitest';
import { stddev, percentileSorted, sortedCopy } from './math.js';

describe('stddev', () => {
  it('母標準偏差を計算する', () => {
    expect(stddev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });
  it('全て同じ値は 0 を返す', () => {
    expect(stddev([5, 5, 5])).toBe(0);
  });
  it('空配列は 0 を返す', () => {
    expect(stddev([])).toBe(0);
  });
});

describe('percentileSorted（線形補間）', () => {
  const xs = [10, 20, 30, 40, 50];
  it('端点は最小値・最大値', () => {
    expect(percentileSorted(xs, 0)).toBe(10);
    expect(percentileSorted(xs, 1)).toBe(50);
  });
  it('順位ちょうどの位置はその値', () => {
    expect(percentileSorted(xs, 0.5)).toBe(30);
    expect(percentileSorted(xs, 0.25)).toBe(20);
  });
  it('順位の間は線形補間する', () => {
    // h = 4 * 0.95 = 3.8 → 40 + 0.8 * 10
    expect(percentileSorted(xs, 0.95)).toBeCloseTo(48, 10);
    // h = 4 * 0.05 = 0.2 → 10 + 0.2 * 10
    expect(percentileSorted(xs, 0.05)).toBeCloseTo(12, 10);
  });
  it('単一要素はその値', () => {
    expect(percentileSorted([7], 0.3)).toBe(7);
  });
  it('空配列は null', () => {
    expect(percentileSorted([], 0.5)).toBeNull();
  });
  it('p は 0〜1 に丸める', () => {
    expect(percentileSorted(xs, 1.5)).toBe(50);
    expect(percentileSorted(xs, -1)).toBe(10);
  });
});

describe('sortedCopy', () => {
  it('数値として昇順ソートする', () => {
    expect(Array.from(sortedCopy([10, 9, 100, -1]))).toEqual([-1, 9, 10, 100]);
  });
});
