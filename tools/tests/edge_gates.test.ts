import { describe, it, expect } from 'vitest';
import {
  costsInR,
  expectedR,
  netExpectedR,
  positionSize,
  scoreToProbability,
} from '../risk/lib/edge.js';
import { evaluateGates } from '../risk/lib/gates.js';

describe('expectedR / costsInR / netExpectedR', () => {
  it('期待値 = p × R − (1 − p)', () => {
    expect(expectedR(0.45, 2.5)).toBeCloseTo(0.575, 12);
    expect(expectedR(0.5, 1)).toBe(0);
  });

  it('往復スリッページと手数料を 1 株リスクで割る', () => {
    // スリッページ 0.001 × 100 × 2 = 0.2 → 0.1R、手数料 1 / 2 = 0.5R
    expect(costsInR(10, 1, 100, 2)).toBeCloseTo(0.6, 12);
  });

  it('1 株リスクが 0 ならコストは 0', () => {
    expect(costsInR(10, 1, 100, 0)).toBe(0);
  });

  it('コスト控除後の期待値', () => {
    expect(netExpectedR(0.45, 2.5, 0.6)).toBeCloseTo(-0.025, 12);
  });
});

describe('scoreToProbability', () => {
  it('両端はクリップ', () => {
    expect(scoreToProbability(0)).toBe(0.15);
    expect(scoreToProbability(-1)).toBe(0.15);
    expect(scoreToProbability(10)).toBe(0.65);
    expect(scoreToProbability(12)).toBe(0.65);
  });

  it('中央 (5) は 0.4 + 0.05 × 0.5', () => {
    expect(scoreToProbability(5)).toBeCloseTo(0.425, 12);
  });

  it('スコアに対して単調非減少', () => {
    let prev = scoreToProbability(0);
    for (let s = 0.5; s <= 10; s += 0.5) {
      const p = scoreToProbability(s);
      expect(p).toBeGreaterThanOrEqual(prev);
      prev = p;
    }
  });
});

describe('positionSize', () => {
  it('リスク額 / 1 株リスク（切り捨て）', () => {
    expect(positionSize(100, 98, 100_000, 0.005)).toEqual({ shares: 250, notional: 25_000 });
    expect(positionSize(100, 97, 100_000, 0.005)).toEqual({ shares: 166, notional: 16_600 });
  });

  it('ショート（stop が上）も同じ株数', () => {
    expect(positionSize(100, 102, 100_000, 0.005).shares).toBe(250);
  });

  it('entry = stop なら 0 株', () => {
    expect(positionSize(100, 100, 100_000, 0.005)).toEqual({ shares: 0, notional: 0 });
  });
});

describe('evaluateGates', () => {
  it('両ゲート通過', () => {
    const r = evaluateGates({ prob_2x: 0.5, p95_max_drawdown: 0.1 });
    expect(r.all_passed).toBe(true);
    expect(r.checks).toEqual([
      { name: 'prob_2x', threshold: 0.4, comparator: '>', value: 0.5, passed: true },
      { name: 'p95_max_drawdown', threshold: 0.2, comparator: '<', value: 0.1, passed: true },
    ]);
  });

  it('閾値ちょうどは不合格（厳密な不等号）', () => {
    const r = evaluateGates({ prob_2x: 0.4, p95_max_drawdown: 0.2 });
    expect(r.checks.map((c) => c.passed)).toEqual([false, false]);
    expect(r.all_passed).toBe(false);
  });

  it('片方だけ落ちても all_passed は false', () => {
    expect(evaluateGates({ prob_2x: 0.9, p95_max_drawdown: 0.35 }).all_passed).toBe(false);
  });
});
