/**
 * lib/path_simulator.ts - エクイティパス生成
 *
 * 【計算仕様】
 * 各イベントで:
 *   1. u = rng()。u < win_probability なら勝ち（ruin 後も必ず 1 回引く）
 *   2. risk_unit = equity × risk_fraction
 *   3. gross = 勝ち: +risk_unit × R / 負け: −risk_unit
 *   4. net = gross − fixed_cost − risk_unit × slippage_bps / 10000
 *   5. equity = max(0, equity + net)。equity が既に 0 なら損益 0（コストも掛からない）
 *
 * パスは (params, deriveSeed(seed, index)) の純関数。
 * アンサンブル全体は持たず、走らせながら PathStats とチェックポイントに畳み込む。
 */

import { ComputeTimeoutError, NumericOverflowError } from '../../../lib/error.js';
import { deriveSeed, mulberry32, type Rng } from '../../../lib/random.js';
import type { BatchResult, BatchSpec, PathStats, SamplePath, SimulationParameters } from '../types.js';
import { totalTrades } from './parameters.js';

/** ファンチャート用チェックポイントの最大数 */
export const MAX_CHECKPOINTS = 121;

type TradeParams = Pick<
  SimulationParameters,
  'reward_multiple' | 'risk_fraction' | 'fixed_cost_per_trade' | 'slippage_bps'
>;

/** 1 イベント適用後のエクイティ */
export function applyTrade(equity: number, win: boolean, p: TradeParams): number {
  if (equity <= 0) return 0;
  const riskUnit = equity * p.risk_fraction;
  const gross = win ? riskUnit * p.reward_multiple : -riskUnit;
  const net = gross - p.fixed_cost_per_trade - (riskUnit * p.slippage_bps) / 10000;
  const next = equity + net;
  return next < 0 ? 0 : next;
}

/**
 * チェックポイントのイベント番号（0 と total を含む昇順）
 * total + 1 点が max 以下なら全点
 */
export function computeCheckpoints(total: number, max = MAX_CHECKPOINTS): number[] {
  if (total + 1 <= max) return Array.from({ length: total + 1 }, (_, i) => i);
  const out: number[] = [];
  for (let j = 0; j < max; j++) out.push(Math.round((j * total) / (max - 1)));
  return out;
}

/** n 本から k 本を等間隔に選ぶ: floor(i × (n − 1) / (k − 1)) */
export function evenlySpacedIndices(n: number, k: number): number[] {
  if (n <= 0 || k <= 0) return [];
  if (k >= n) return Array.from({ length: n }, (_, i) => i);
  if (k === 1) return [0];
  const out: number[] = [];
  for (let i = 0; i < k; i++) out.push(Math.floor((i * (n - 1)) / (k - 1)));
  return out;
}

function emptyStats(startingCapital: number): PathStats {
  return {
    final_equity: startingCapital,
    max_drawdown: 0,
    wins: 0,
    trades: 0,
    gross_profit: 0,
    gross_loss: 0,
    profit_trades: 0,
    loss_trades: 0,
    largest_win: 0,
    largest_loss: 0,
    ret_count: 0,
    ret_mean: 0,
    ret_m2: 0,
  };
}

export interface PathSink {
  /** チェックポイントの値を書き込む先と先頭オフセット */
  checkpoints?: { indices: number[]; out: Float64Array; offset: number };
  /** 全点を記録する場合の配列 */
  path?: number[];
}

/**
 * 1 本のパスを走らせる
 * @param rng 注入された乱数（パスごとに独立したもの）
 */
export function simulatePath(params: SimulationParameters, rng: Rng, sink: PathSink = {}): PathStats {
  const n = totalTrades(params);
  const stats = emptyStats(params.starting_capital);
  const cps = sink.checkpoints;
  const path = sink.path;

  let equity = params.starting_capital;
  let peak = equity;
  let cp = 0;
  if (cps && cps.indices[0] === 0) {
    cps.out[cps.offset] = equity;
    cp = 1;
  }
  path?.push(equity);

  for (let t = 1; t <= n; t++) {
    const win = rng() < params.win_probability;
    if (win) stats.wins++;
    stats.trades++;

    const prev = equity;
    equity = applyTrade(prev, win, params);
    if (!Number.isFinite(equity)) throw new NumericOverflowError('equity', equity);

    if (prev > 0) {
      const pnl = equity - prev;
      if (pnl > 0) {
        stats.gross_profit += pnl;
        stats.profit_trades++;
        if (pnl > stats.largest_win) stats.largest_win = pnl;
      } else if (pnl < 0) {
        stats.gross_loss += pnl;
        stats.loss_trades++;
        if (pnl < stats.largest_loss) stats.largest_loss = pnl;
      }
      // Welford
      const r = pnl / prev;
      stats.ret_count++;
      const delta = r - stats.ret_mean;
      stats.ret_mean += delta / stats.ret_count;
      stats.ret_m2 += delta * (r - stats.ret_mean);
    }

    if (equity > peak) {
      peak = equity;
    } else {
      const dd = (peak - equity) / peak;
      if (dd > stats.max_drawdown) stats.max_drawdown = dd;
    }

    if (cps && cp < cps.indices.length && cps.indices[cp] === t) {
      cps.out[cps.offset + cp] = equity;
      cp++;
    }
    path?.push(equity);
  }

  stats.final_equity = equity;
  return stats;
}

export interface BatchDeadline {
  /** Date.now() 基準の期限 */
  at: number;
  timeoutMs: number;
}

/**
 * パス番号 [start, end) をまとめて走らせる
 * deadline 指定時はパスの合間に期限を確認し、超過で ComputeTimeoutError
 */
export function simulateBatch(spec: BatchSpec, deadline?: BatchDeadline): BatchResult {
  const { params, seed, start, end, checkpoints, sampleIndices } = spec;
  const count = Math.max(0, end - start);
  const width = checkpoints.length;
  const checkpointEquity = new Float64Array(count * width);
  const stats: PathStats[] = [];
  const samples: SamplePath[] = [];
  const sampleSet = new Set(sampleIndices);

  for (let i = start; i < end; i++) {
    if (deadline && Date.now() > deadline.at) throw new ComputeTimeoutError(deadline.timeoutMs);
    const rng = mulberry32(deriveSeed(seed, i));
    const path = sampleSet.has(i) ? [] : undefined;
    stats.push(
      simulatePath(params, rng, {
        checkpoints: { indices: checkpoints, out: checkpointEquity, offset: (i - start) * width },
        path,
      })
    );
    if (path) samples.push({ index: i, equity: path });
  }

  return { start, end, stats, checkpointEquity, samples };
}

/** [0, n) を最大 parts 個の連続区間に分割（サイズ差は高々 1） */
export function planBatches(n: number, parts: number): Array<{ start: number; end: number }> {
  const k = Math.max(1, Math.min(Math.floor(parts), n));
  const base = Math.floor(n / k);
  const extra = n % k;
  const out: Array<{ start: number; end: number }> = [];
  let start = 0;
  for (let i = 0; i < k; i++) {
    const size = base + (i < extra ? 1 : 0);
    out.push({ start, end: start + size });
    start += size;
  }
  return out;
}
