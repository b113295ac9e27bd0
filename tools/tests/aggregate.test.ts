import { describe, it, expect } from 'vitest';
import { aggregateEnsemble, annualizedSharpe, mergeMoments } from '../risk/lib/aggregate.js';
import type { BatchResult, PathStats, SimulationParameters } from '../risk/types.js';

const params: SimulationParameters = {
  win_probability: 0.5,
  reward_multiple: 2,
  risk_fraction: 0.01,
  trades_per_period: 1,
  periods: 4,
  fixed_cost_per_trade: 0,
  slippage_bps: 0,
  starting_capital: 1000,
  num_simulations: 100,
};
const opts = { periodsPerYear: 52, riskFreeRate: 0 };
const checkpoints = [0, 4];

function path(over: Partial<PathStats>): PathStats {
  return {
    final_equity: 1000,
    max_drawdown: 0,
    wins: 0,
    trades: 4,
    gross_profit: 0,
    gross_loss: 0,
    profit_trades: 0,
    loss_trades: 0,
    largest_win: 0,
    largest_loss: 0,
    ret_count: 4,
    ret_mean: 0.01,
    ret_m2: 0.0004,
    ...over,
  };
}

// 4 本のパス（最終 500 / 1000 / 2000 / 3000）
const paths: PathStats[] = [
  path({ final_equity: 500, max_drawdown: 0.6, wins: 1, gross_profit: 100, gross_loss: -600, profit_trades: 1, loss_trades: 3, largest_win: 100, largest_loss: -300 }),
  path({ final_equity: 1000, max_drawdown: 0.1, wins: 2, gross_profit: 200, gross_loss: -200, profit_trades: 2, loss_trades: 2, largest_win: 150, largest_loss: -120 }),
  path({ final_equity: 2000, max_drawdown: 0.05, wins: 3, gross_profit: 1100, gross_loss: -100, profit_trades: 3, loss_trades: 1, largest_win: 500, largest_loss: -100 }),
  path({ final_equity: 3000, max_drawdown: 0, wins: 4, gross_profit: 2000, profit_trades: 4, largest_win: 900 }),
];

function batch(start: number, end: number, stats: PathStats[] = paths): BatchResult {
  const slice = stats.slice(start, end);
  const checkpointEquity = new Float64Array(slice.length * 2);
  slice.forEach((s, r) => {
    checkpointEquity[r * 2] = 1000;
    checkpointEquity[r * 2 + 1] = s.final_equity;
  });
  return { start, end, stats: slice, checkpointEquity, samples: [] };
}

describe('aggregateEnsemble', () => {
  const res = aggregateEnsemble(params, [batch(0, 4)], checkpoints, opts);

  it('最終エクイティの要約統計', () => {
    expect(res.final_equity).toEqual([500, 1000, 2000, 3000]);
    expect(res.summary.mean_final_equity).toBe(1625);
    expect(res.summary.median_final_equity).toBe(1500);
    expect(res.summary.std_final_equity).toBeCloseTo(Math.sqrt(921875), 9);
    expect(res.summary.min_equity).toBe(500);
    expect(res.summary.max_equity).toBe(3000);
  });

  it('到達確率は初期資金の倍数で判定する', () => {
    expect(res.risk_metrics.prob_2x).toBe(0.5);
    expect(res.risk_metrics.prob_3x).toBe(0.25);
    // 1000 ちょうどは損失に数えない
    expect(res.risk_metrics.prob_loss).toBe(0.25);
    expect(res.risk_metrics.prob_dd_50).toBe(0.25);
  });

  it('p95 ドローダウンは割合、VaR / CVaR はドル建て', () => {
    expect(res.risk_metrics.p95_max_drawdown).toBeCloseTo(0.525, 10);
    expect(res.risk_metrics.var_95).toBeCloseTo(-425, 9);
    expect(res.risk_metrics.cvar_95).toBe(-500);
  });

  it('トレード集計', () => {
    const m = res.risk_metrics;
    expect(m.win_rate).toBe(10 / 16);
    expect(m.profit_factor).toBeCloseTo(3400 / 900, 12);
    expect(m.avg_win).toBe(340);
    expect(m.avg_loss).toBe(-150);
    expect(m.largest_win).toBe(900);
    expect(m.largest_loss).toBe(-300);
    expect(m.expected_r).toBe(0.5);
  });

  it('Sharpe は年間トレード数の平方根で年率換算', () => {
    expect(res.risk_metrics.sharpe_ratio).toBeCloseTo(Math.sqrt(52), 6);
    expect(res.warnings).toEqual([]);
  });

  it('チェックポイントごとのバンド', () => {
    expect(res.bands).toHaveLength(2);
    expect(res.bands[0]).toEqual({ trade: 0, mean: 1000, p05: 1000, p25: 1000, p50: 1000, p75: 1000, p95: 1000 });
    expect(res.bands[1].trade).toBe(4);
    expect(res.bands[1].mean).toBe(1625);
    expect(res.bands[1].p50).toBe(1500);
    expect(res.bands[1].p05).toBeCloseTo(575, 9);
    expect(res.bands[1].p95).toBeCloseTo(2850, 9);
  });

  it('バッチの分割・順序に依存しない', () => {
    const split = aggregateEnsemble(params, [batch(3, 4), batch(0, 1), batch(1, 3)], checkpoints, opts);
    expect(split).toEqual(res);
  });

  it('欠けたバッチは例外', () => {
    expect(() => aggregateEnsemble(params, [batch(0, 1), batch(2, 4)], checkpoints, opts)).toThrow(
      'batch gap: expected start 1, got 2',
    );
  });

  it('空のアンサンブルは例外', () => {
    expect(() => aggregateEnsemble(params, [], checkpoints, opts)).toThrow('empty ensemble');
  });

  it('損失トレードが無ければ profit_factor は null と警告', () => {
    const winners = paths.map((p) => ({ ...p, gross_loss: 0, loss_trades: 0, largest_loss: 0 }));
    const r = aggregateEnsemble(params, [batch(0, 4, winners)], checkpoints, opts);
    expect(r.risk_metrics.profit_factor).toBeNull();
    expect(r.risk_metrics.avg_loss).toBe(0);
    expect(r.warnings.map((w) => w.code)).toEqual(['profit_factor_undefined']);
  });

  it('リターンの分散が 0 なら sharpe_ratio = 0 と警告', () => {
    const flat = paths.map((p) => ({ ...p, ret_m2: 0 }));
    const r = aggregateEnsemble(params, [batch(0, 4, flat)], checkpoints, opts);
    expect(r.risk_metrics.sharpe_ratio).toBe(0);
    expect(r.warnings.map((w) => w.code)).toEqual(['sharpe_undefined']);
  });
});

describe('mergeMoments', () => {
  it('2 系列を結合すると全体の平均・分散に一致', () => {
    // [1, 2, 3] と [4, 5]
    const a = { count: 3, mean: 2, m2: 2 };
    const b = { count: 2, mean: 4.5, m2: 0.5 };
    const m = mergeMoments(a, b);
    expect(m.count).toBe(5);
    expect(m.mean).toBe(3);
    expect(m.m2).toBeCloseTo(10, 12);
  });

  it('空側はもう一方をそのまま返す', () => {
    const a = { count: 2, mean: 1, m2: 0 };
    expect(mergeMoments(a, { count: 0, mean: 0, m2: 0 })).toEqual(a);
    expect(mergeMoments({ count: 0, mean: 0, m2: 0 }, a)).toEqual(a);
  });
});

describe('annualizedSharpe', () => {
  it('無リスク金利をトレード単位に割って差し引く', () => {
    // mean 0.02, std 0.1, 年 100 トレード, rf 1% → (0.02 − 0.0001) / 0.1 × 10
    const s = annualizedSharpe({ count: 4, mean: 0.02, m2: 0.04 }, 100, 0.01);
    expect(s).toBeCloseTo(1.99, 9);
  });

  it('件数 0 や分散 0 は null', () => {
    expect(annualizedSharpe({ count: 0, mean: 0, m2: 0 }, 52, 0)).toBeNull();
    expect(annualizedSharpe({ count: 3, mean: 0.01, m2: 0 }, 52, 0)).toBeNull();
  });
});
