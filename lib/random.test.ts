import { describe, it, expect } from 'vitest';
import { mulberry32, deriveSeed, randomSeed } from './random.js';

function take(seed: number, n: number): number[] {
  const rng = mulberry32(seed);
  return Array.from({ length: n }, () => rng());
}

describe('mulberry32', () => {
  it('同じ seed なら同じ系列を返す', () => {
    expect(take(42, 20)).toEqual(take(42, 20));
  });
  it('異なる seed は異なる系列を返す', () => {
    expect(take(42, 5)).not.toEqual(take(43, 5));
  });
  it('値は [0, 1) に収まる', () => {
    for (const v of take(123, 5000)) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
  it('平均はおおよそ 0.5', () => {
    const xs = take(7, 20000);
    const mean = xs.reduce((s, v) => s + v, 0) / xs.length;
    expect(mean).toBeGreaterThan(0.48);
    expect(mean).toBeLessThan(0.52);
  });
});

describe('deriveSeed', () => {
  it('決定的', () => {
    expect(deriveSeed(42, 3)).toBe(deriveSeed(42, 3));
  });
  it('32bit 符号なし整数を返す', () => {
    const s = deriveSeed(0xffffffff, 999);
    expect(Number.isInteger(s)).toBe(true);
    expect(s).toBeGreaterThanOrEqual(0);
    expect(s).toBeLessThan(2 ** 32);
  });
  it('隣接するパス番号で衝突しない', () => {
    const seeds = new Set(Array.from({ length: 1000 }, (_, i) => deriveSeed(42, i)));
    expect(seeds.size).toBe(1000);
  });
  it('親 seed が違えば子 seed も違う', () => {
    expect(deriveSeed(1, 0)).not.toBe(deriveSeed(2, 0));
  });
});

describe('randomSeed', () => {
  it('32bit 範囲の整数', () => {
    const s = randomSeed();
    expect(Number.isInteger(s)).toBe(true);
    expect(s).toBeGreaterThanOrEqual(0);
    expect(s).toBeLessThan(2 ** 32);
  });
});
