/**
 * lib/aggregate.ts - アンサンブル統計
 *
 * バッチ結果をパス番号順に並べてから畳み込む。
 * ワーカーへの分割の仕方が変わっても同じ順序・同じ浮動小数演算になる。
 */

import { percentileSorted, sortedCopy, stddev } from '../../../lib/math.js';
import type {
  BatchResult,
  EquityBand,
  PathStats,
  RiskMetrics,
  SamplePath,
  SimulationParameters,
  SimulationWarning,
  SummaryStats,
} from '../types.js';

export interface AggregateOptions {
  /** 年あたり期間数（週なら 52） */
  periodsPerYear: number;
  /** 年率の無リスク金利 */
  riskFreeRate: number;
}

export interface EnsembleStats {
  final_equity: number[];
  summary: SummaryStats;
  risk_metrics: RiskMetrics;
  bands: EquityBand[];
  samples: SamplePath[];
  warnings: SimulationWarning[];
}

interface Moments {
  count: number;
  mean: number;
  m2: number;
}

/** Chan の並列分散アルゴリズムで 2 つのモーメントを結合 */
export function mergeMoments(a: Moments, b: Moments): Moments {
  if (b.count === 0) return a;
  if (a.count === 0) return { ...b };
  const count = a.count + b.count;
  const delta = b.mean - a.mean;
  return {
    count,
    mean: a.mean + (delta * b.count) / count,
    m2: a.m2 + b.m2 + (delta * delta * a.count * b.count) / count,
  };
}

function orderBatches(batches: BatchResult[]): BatchResult[] {
  const sorted = [...batches].sort((a, b) => a.start - b.start);
  let next = 0;
  for (const b of sorted) {
    if (b.start !== next) throw new Error(`batch gap: expected start ${next}, got ${b.start}`);
    if (b.stats.length !== b.end - b.start) throw new Error(`batch [${b.start}, ${b.end}) has ${b.stats.length} paths`);
    next = b.end;
  }
  return sorted;
}

function computeBands(batches: BatchResult[], checkpoints: number[], n: number): EquityBand[] {
  const width = checkpoints.length;
  const column = new Float64Array(n);
  const bands: EquityBand[] = [];
  for (let c = 0; c < width; c++) {
    let k = 0;
    let sum = 0;
    for (const b of batches) {
      const rows = b.end - b.start;
      for (let r = 0; r < rows; r++) {
        const v = b.checkpointEquity[r * width + c];
        column[k++] = v;
        sum += v;
      }
    }
    column.sort();
    bands.push({
      trade: checkpoints[c],
      mean: sum / n,
      p05: percentileSorted(column, 0.05) ?? 0,
      p25: percentileSorted(column, 0.25) ?? 0,
      p50: percentileSorted(column, 0.5) ?? 0,
      p75: percentileSorted(column, 0.75) ?? 0,
      p95: percentileSorted(column, 0.95) ?? 0,
    });
  }
  return bands;
}

function share(values: ArrayLike<number>, pred: (v: number) => boolean): number {
  let hit = 0;
  for (let i = 0; i < values.length; i++) if (pred(values[i])) hit++;
  return values.length ? hit / values.length : 0;
}

/**
 * Sharpe（年率換算）
 * (mean(r) − rf/年間トレード数) / std(r) × sqrt(年間トレード数)
 * std = 0 の場合は 0 を返し、呼び出し側で警告を付ける
 */
export function annualizedSharpe(m: Moments, tradesPerYear: number, riskFreeRate: number): number | null {
  if (m.count === 0) return null;
  const std = Math.sqrt(Math.max(0, m.m2 / m.count));
  if (!(std > 0)) return null;
  const rfPerTrade = riskFreeRate / tradesPerYear;
  return ((m.mean - rfPerTrade) / std) * Math.sqrt(tradesPerYear);
}

/**
 * バッチ結果からアンサンブル統計を計算
 */
export function aggregateEnsemble(
  params: SimulationParameters,
  batches: BatchResult[],
  checkpoints: number[],
  opts: AggregateOptions
): EnsembleStats {
  const ordered = orderBatches(batches);
  const paths: PathStats[] = ordered.flatMap((b) => b.stats);
  const n = paths.length;
  if (n === 0) throw new Error('empty ensemble');

  const start = params.starting_capital;
  const finals = paths.map((s) => s.final_equity);
  const sortedFinals = sortedCopy(finals);
  const sortedDd = sortedCopy(paths.map((s) => s.max_drawdown));

  let sumFinal = 0;
  for (const v of finals) sumFinal += v;

  const summary: SummaryStats = {
    mean_final_equity: sumFinal / n,
    median_final_equity: percentileSorted(sortedFinals, 0.5) ?? start,
    std_final_equity: stddev(finals),
    min_equity: sortedFinals[0],
    max_equity: sortedFinals[n - 1],
  };

  // VaR / CVaR（ドル建て: final − start）
  const sortedDelta = sortedFinals.map((v) => v - start);
  const var95 = percentileSorted(sortedDelta, 0.05) ?? 0;
  let tailSum = 0;
  let tailCount = 0;
  for (const d of sortedDelta) {
    if (d > var95) break;
    tailSum += d;
    tailCount++;
  }
  const cvar95 = tailCount ? tailSum / tailCount : var95;

  // トレード集計（パス番号順）
  let wins = 0;
  let trades = 0;
  let grossProfit = 0;
  let grossLoss = 0;
  let profitTrades = 0;
  let lossTrades = 0;
  let largestWin = 0;
  let largestLoss = 0;
  let moments: Moments = { count: 0, mean: 0, m2: 0 };
  for (const s of paths) {
    wins += s.wins;
    trades += s.trades;
    grossProfit += s.gross_profit;
    grossLoss += s.gross_loss;
    profitTrades += s.profit_trades;
    lossTrades += s.loss_trades;
    if (s.largest_win > largestWin) largestWin = s.largest_win;
    if (s.largest_loss < largestLoss) largestLoss = s.largest_loss;
    moments = mergeMoments(moments, { count: s.ret_count, mean: s.ret_mean, m2: s.ret_m2 });
  }

  const warnings: SimulationWarning[] = [];

  let profitFactor: number | null = null;
  if (grossLoss < 0) {
    profitFactor = grossProfit / Math.abs(grossLoss);
  } else {
    warnings.push({
      code: 'profit_factor_undefined',
      message: '損失トレードが 1 件もないため profit_factor は算出できません (null)',
    });
  }

  const tradesPerYear = params.trades_per_period * opts.periodsPerYear;
  let sharpe = annualizedSharpe(moments, tradesPerYear, opts.riskFreeRate);
  if (sharpe == null) {
    sharpe = 0;
    warnings.push({
      code: 'sharpe_undefined',
      message: 'トレードリターンの標準偏差が 0 のため sharpe_ratio は 0 としました',
    });
  }

  const p = params.win_probability;
  const risk_metrics: RiskMetrics = {
    prob_2x: share(finals, (v) => v >= 2 * start),
    prob_3x: share(finals, (v) => v >= 3 * start),
    prob_loss: share(finals, (v) => v < start),
    prob_dd_50: share(sortedDd, (v) => v >= 0.5),
    p95_max_drawdown: percentileSorted(sortedDd, 0.95) ?? 0,
    sharpe_ratio: sharpe,
    var_95: var95,
    cvar_95: cvar95,
    win_rate: trades ? wins / trades : 0,
    profit_factor: profitFactor,
    avg_win: profitTrades ? grossProfit / profitTrades : 0,
    avg_loss: lossTrades ? grossLoss / lossTrades : 0,
    largest_win: largestWin,
    largest_loss: largestLoss,
    expected_r: p * params.reward_multiple - (1 - p),
  };

  return {
    final_equity: finals,
    summary,
    risk_metrics,
    bands: computeBands(ordered, checkpoints, n),
    samples: ordered.flatMap((b) => b.samples).sort((a, b) => a.index - b.index),
    warnings,
  };
}
