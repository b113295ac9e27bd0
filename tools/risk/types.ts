/**
 * risk/types.ts - モンテカルロ・リスクシミュレーション用型定義
 *
 * 【重要な定義】
 * - エクイティ: ドル建ての口座残高。0 で下限クリップ（ruin 後は 0 のまま）
 * - ドローダウン: (peak - equity) / peak。0〜1 の割合（表示時に % 変換）
 * - 1 トレードのリスク額: 直前エクイティ × risk_fraction
 * - イベント数: trades_per_period × periods。パス長はイベント数 + 1（初期値を含む）
 */

import type { ResultWarning } from '../../src/types/domain.js';

export interface SimulationParameters {
  win_probability: number;
  reward_multiple: number;
  risk_fraction: number;
  trades_per_period: number;
  periods: number;
  fixed_cost_per_trade: number;
  slippage_bps: number;
  starting_capital: number;
  num_simulations: number;
}

export type ParameterName = keyof SimulationParameters;

/** 1 本のパスを 1 度走らせて得られる集計値（パス全体は保持しない） */
export interface PathStats {
  final_equity: number;
  /** 0〜1 */
  max_drawdown: number;
  /** 乱数判定で勝ちに分類されたイベント数（ruin 後も数える） */
  wins: number;
  trades: number;
  /** 実現損益 > 0 の合計 */
  gross_profit: number;
  /** 実現損益 < 0 の合計（負数） */
  gross_loss: number;
  profit_trades: number;
  loss_trades: number;
  largest_win: number;
  largest_loss: number;
  /** リターン系列 r_t = (e_t - e_{t-1}) / e_{t-1}（e_{t-1} > 0 の区間のみ）の Welford 統計 */
  ret_count: number;
  ret_mean: number;
  ret_m2: number;
}

export interface SamplePath {
  /** アンサンブル内のパス番号 */
  index: number;
  equity: number[];
}

/** パス番号 [start, end) を担当するバッチの入力 */
export interface BatchSpec {
  params: SimulationParameters;
  seed: number;
  start: number;
  end: number;
  /** エクイティを記録するイベント番号（昇順、0 と総イベント数を含む） */
  checkpoints: number[];
  /** パス全体を保持するパス番号（昇順） */
  sampleIndices: number[];
}

export interface BatchResult {
  start: number;
  end: number;
  stats: PathStats[];
  /** 行優先 (end - start) × checkpoints.length */
  checkpointEquity: Float64Array;
  samples: SamplePath[];
}

export interface SummaryStats {
  mean_final_equity: number;
  median_final_equity: number;
  std_final_equity: number;
  min_equity: number;
  max_equity: number;
}

export interface RiskMetrics {
  prob_2x: number;
  prob_3x: number;
  prob_loss: number;
  prob_dd_50: number;
  /** 0〜1 */
  p95_max_drawdown: number;
  sharpe_ratio: number;
  /** ドル建て。final - start の 5 パーセンタイル */
  var_95: number;
  /** ドル建て。VaR 以下の平均 */
  cvar_95: number;
  win_rate: number;
  /** 損失トレードが 1 件もない場合は null */
  profit_factor: number | null;
  avg_win: number;
  avg_loss: number;
  largest_win: number;
  largest_loss: number;
  /** p × R − (1 − p)。コスト控除前のリスク単位あたり期待値 */
  expected_r: number;
}

export interface EquityBand {
  /** イベント番号 */
  trade: number;
  mean: number;
  p05: number;
  p25: number;
  p50: number;
  p75: number;
  p95: number;
}

export type GateName = 'prob_2x' | 'p95_max_drawdown';

export interface GateCheck {
  name: GateName;
  value: number;
  threshold: number;
  comparator: '>' | '<';
  passed: boolean;
}

export interface GateReport {
  checks: GateCheck[];
  all_passed: boolean;
}

export type SimulationWarningCode = 'low_raw_edge' | 'profit_factor_undefined' | 'sharpe_undefined';

export interface SimulationWarning extends ResultWarning {
  code: SimulationWarningCode;
}

export interface SimulationResult extends SummaryStats {
  parameters: SimulationParameters;
  seed: number;
  total_trades: number;
  risk_metrics: RiskMetrics;
  gates: GateReport;
  /** 長さ num_simulations。パス番号順 */
  final_equity_distribution: number[];
  sample_paths: number[][];
  sample_indices: number[];
  bands: EquityBand[];
  warnings: SimulationWarning[];
  /** ISO8601 */
  timestamp: string;
  computation_time_ms: number;
}
