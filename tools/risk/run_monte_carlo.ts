/**
 * run_monte_carlo.ts - モンテカルロ・リスクシミュレーションのエントリーポイント
 *
 * 検証 → パス生成（worker_threads）→ 統計集計 → 結果組み立て
 */

import { NumericOverflowError } from '../../lib/error.js';
import { formatPercent, formatRatio, formatUsd } from '../../lib/formatter.js';
import { logger } from '../../lib/logger.js';
import { randomSeed } from '../../lib/random.js';
import { nowIso, toDisplayTime } from '../../lib/datetime.js';
import type { Violation } from '../../src/types/domain.js';
import { aggregateEnsemble } from './lib/aggregate.js';
import { evaluateGates } from './lib/gates.js';
import { SeedSchema, totalTrades, validateParameters } from './lib/parameters.js';
import { computeCheckpoints, evenlySpacedIndices } from './lib/path_simulator.js';
import { runPathBatches } from './lib/worker_pool.js';
import type { RiskMetrics, SimulationResult, SimulationWarning } from './types.js';

export const MAX_SAMPLE_CAP = 50;

export const RUN_DEFAULTS = {
  sampleCap: 15,
  workers: 0,
  timeoutMs: 60_000,
  periodsPerYear: 52,
  riskFreeRate: 0,
} as const;

export interface RunMonteCarloOptions {
  /** 未指定時は 32bit の乱数 seed を引き、結果に含めて返す */
  seed?: number;
  /** 返すサンプルパス数の上限（1〜50） */
  sampleCap?: number;
  /** 0 で同一スレッド実行 */
  workers?: number;
  timeoutMs?: number;
  periodsPerYear?: number;
  /** 年率 */
  riskFreeRate?: number;
}

export interface RunMonteCarloOutput {
  ok: true;
  data: SimulationResult;
  warnings: SimulationWarning[];
}

export interface RunMonteCarloError {
  ok: false;
  error: string;
  violations: Violation[];
  warnings: SimulationWarning[];
}

export type RunMonteCarloResult = RunMonteCarloOutput | RunMonteCarloError;

function clampSampleCap(value: number): number {
  if (!Number.isFinite(value)) return RUN_DEFAULTS.sampleCap;
  return Math.min(MAX_SAMPLE_CAP, Math.max(1, Math.floor(value)));
}

const METRIC_KEYS: ReadonlyArray<keyof RiskMetrics> = [
  'prob_2x',
  'prob_3x',
  'prob_loss',
  'prob_dd_50',
  'p95_max_drawdown',
  'sharpe_ratio',
  'var_95',
  'cvar_95',
  'win_rate',
  'profit_factor',
  'avg_win',
  'avg_loss',
  'largest_win',
  'largest_loss',
  'expected_r',
];

/** 返却前に全スカラーが有限か確認（profit_factor の null は許容） */
function assertFinite(result: SimulationResult): void {
  const scalars: Array<[string, number | null]> = [
    ['mean_final_equity', result.mean_final_equity],
    ['median_final_equity', result.median_final_equity],
    ['std_final_equity', result.std_final_equity],
    ['min_equity', result.min_equity],
    ['max_equity', result.max_equity],
    ...METRIC_KEYS.map((k): [string, number | null] => [`risk_metrics.${k}`, result.risk_metrics[k]]),
  ];
  for (const [field, value] of scalars) {
    if (value !== null && !Number.isFinite(value)) throw new NumericOverflowError(field, value);
  }
  for (const band of result.bands) {
    for (const key of ['mean', 'p05', 'p25', 'p50', 'p75', 'p95'] as const) {
      if (!Number.isFinite(band[key])) throw new NumericOverflowError(`bands[${band.trade}].${key}`, band[key]);
    }
  }
}

/**
 * モンテカルロ・シミュレーションを実行
 *
 * 範囲違反は ok: false で返す。形が壊れた入力や 32bit 整数でない seed（ZodError）、
 * 期限超過（ComputeTimeoutError）と非有限値（NumericOverflowError）は throw する。
 */
export default async function runMonteCarlo(
  input: unknown,
  options: RunMonteCarloOptions = {}
): Promise<RunMonteCarloResult> {
  const validation = validateParameters(input);
  if (!validation.ok) {
    return {
      ok: false,
      error: `invalid parameters: ${validation.violations.map((v) => v.field).join(', ')}`,
      violations: validation.violations,
      warnings: validation.warnings,
    };
  }

  const params = validation.value;
  const seed = SeedSchema.parse(options.seed ?? randomSeed());
  const {
    sampleCap = RUN_DEFAULTS.sampleCap,
    workers = RUN_DEFAULTS.workers,
    timeoutMs = RUN_DEFAULTS.timeoutMs,
    periodsPerYear = RUN_DEFAULTS.periodsPerYear,
    riskFreeRate = RUN_DEFAULTS.riskFreeRate,
  } = options;

  const n = params.num_simulations;
  const total = totalTrades(params);
  const checkpoints = computeCheckpoints(total);
  const sampleIndices = evenlySpacedIndices(n, clampSampleCap(sampleCap));

  const t0 = performance.now();
  const batches = await runPathBatches({ params, seed, checkpoints, sampleIndices }, n, { workers, timeoutMs });
  const ensemble = aggregateEnsemble(params, batches, checkpoints, { periodsPerYear, riskFreeRate });
  const computationTimeMs = performance.now() - t0;

  const warnings = [...validation.warnings, ...ensemble.warnings];
  const result: SimulationResult = {
    parameters: params,
    seed,
    total_trades: total,
    ...ensemble.summary,
    risk_metrics: ensemble.risk_metrics,
    gates: evaluateGates(ensemble.risk_metrics),
    final_equity_distribution: ensemble.final_equity,
    sample_paths: ensemble.samples.map((s) => s.equity),
    sample_indices: ensemble.samples.map((s) => s.index),
    bands: ensemble.bands,
    warnings,
    timestamp: nowIso(),
    computation_time_ms: Math.round(computationTimeMs * 100) / 100,
  };
  assertFinite(result);

  logger.info('mc_run', {
    seed,
    num_simulations: n,
    total_trades: total,
    workers,
    ms: result.computation_time_ms,
  });
  for (const w of warnings) logger.warn('mc_warning', { code: w.code, seed });

  return { ok: true, data: result, warnings };
}

/**
 * サマリーテキストを生成
 */
export function generateSummaryText(result: SimulationResult): string {
  const { parameters: p, risk_metrics: m } = result;
  const start = p.starting_capital;
  const lines: string[] = [];

  lines.push('=== Monte Carlo Risk Simulation ===');
  lines.push(
    `Setup: 勝率 ${formatPercent(p.win_probability, { multiply: true })} / ${p.reward_multiple}R / リスク ${formatPercent(p.risk_fraction, { multiply: true, digits: 2 })}`
  );
  lines.push(
    `Trades: ${p.trades_per_period} × ${p.periods} = ${result.total_trades} / path, ${p.num_simulations} paths (seed ${result.seed})`
  );
  lines.push(`Costs: ${formatUsd(p.fixed_cost_per_trade, { digits: 2 })}/trade + ${p.slippage_bps}bps`);
  lines.push(`Run at: ${toDisplayTime(Date.parse(result.timestamp)) ?? result.timestamp}`);
  lines.push('');

  lines.push('【最終エクイティ】');
  lines.push(`  Start: ${formatUsd(start)}`);
  lines.push(
    `  Mean: ${formatUsd(result.mean_final_equity)} / Median: ${formatUsd(result.median_final_equity)} (σ ${formatUsd(result.std_final_equity)})`
  );
  lines.push(`  Range: ${formatUsd(result.min_equity)} 〜 ${formatUsd(result.max_equity)}`);
  lines.push('');

  lines.push('【リスク指標】');
  lines.push(
    `  P(2x): ${formatPercent(m.prob_2x, { multiply: true })} / P(3x): ${formatPercent(m.prob_3x, { multiply: true })} / P(loss): ${formatPercent(m.prob_loss, { multiply: true })}`
  );
  lines.push(
    `  Max DD (p95): -${formatPercent(m.p95_max_drawdown, { multiply: true })} / P(DD≥50%): ${formatPercent(m.prob_dd_50, { multiply: true })}`
  );
  lines.push(`  VaR95: ${formatUsd(m.var_95, { sign: true })} / CVaR95: ${formatUsd(m.cvar_95, { sign: true })}`);
  lines.push(
    `  Sharpe: ${formatRatio(m.sharpe_ratio)} / Win rate: ${formatPercent(m.win_rate, { multiply: true })} / PF: ${formatRatio(m.profit_factor)}`
  );
  lines.push(`  Expected R (before costs): ${formatRatio(m.expected_r, 3)}`);
  lines.push('');

  lines.push('【ゲート】');
  for (const g of result.gates.checks) {
    lines.push(`  ${g.passed ? '✓' : '✗'} ${g.name} ${g.comparator} ${g.threshold} (actual ${formatRatio(g.value, 3)})`);
  }

  if (result.warnings.length) {
    lines.push('');
    lines.push('【注意】');
    for (const w of result.warnings) lines.push(`  - ${w.message}`);
  }

  return lines.join('\n');
}
