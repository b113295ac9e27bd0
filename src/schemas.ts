import { z } from 'zod';
import { DEFAULT_PARAMETERS, PARAMETER_CONFIG, SeedSchema } from '../tools/risk/lib/parameters.js';
import type { ParameterName } from '../tools/risk/types.js';

/**
 * 範囲はスキーマでは絞らず、describe に記載するだけにする。
 * 範囲検証は validateParameters が全件まとめて行い、違反をフィールド単位で返す。
 */
function parameterField(name: ParameterName) {
  const c = PARAMETER_CONFIG[name];
  const unit = c.unit ? ` [${c.unit}]` : '';
  const kind = c.integer ? 'integer' : 'number';
  return z
    .number()
    .optional()
    .default(DEFAULT_PARAMETERS[name])
    .describe(`${c.label}${unit}: ${kind} in [${c.min}, ${c.max}] (default ${c.default})`);
}

export const SimulationParametersInputShape = {
  win_probability: parameterField('win_probability'),
  reward_multiple: parameterField('reward_multiple'),
  risk_fraction: parameterField('risk_fraction'),
  trades_per_period: parameterField('trades_per_period'),
  periods: parameterField('periods'),
  fixed_cost_per_trade: parameterField('fixed_cost_per_trade'),
  slippage_bps: parameterField('slippage_bps'),
  starting_capital: parameterField('starting_capital'),
  num_simulations: parameterField('num_simulations'),
};

export const ResultViewEnum = z.enum(['summary', 'full']);

export const RunMonteCarloInputSchema = z.object({
  ...SimulationParametersInputShape,
  seed: SeedSchema.optional().describe('32bit seed。同じ seed と入力なら結果は完全に一致する。未指定時はランダムに選び結果に含める'),
  sample_cap: z.number().int().min(1).max(50).optional().describe('返すサンプルパス数の上限 (default: 15)'),
  timeout_ms: z.number().int().min(100).max(600_000).optional().describe('計算時間の上限 [ms] (default: 60000)'),
  include_svg: z.boolean().optional().default(false).describe('ファンチャート + 分布ヒストグラムの SVG を返す'),
  view: ResultViewEnum.optional()
    .default('summary')
    .describe('summary: 分布・サンプルパス・帯を省略 / full: すべて返す'),
});

export type RunMonteCarloInput = z.infer<typeof RunMonteCarloInputSchema>;

export const GetMonteCarloExampleInputSchema = z.object({});

/** signal_score と win_probability のどちらか一方は必須（ハンドラ側で検査） */
export const EstimateTradeEdgeInputSchema = z.object({
  signal_score: z.number().min(0).max(10).optional().describe('シグナルスコア 0〜10。win_probability 未指定時に勝率へ換算'),
  win_probability: z.number().gt(0).lt(1).optional().describe('勝率を直接指定する場合 (0〜1)'),
  reward_multiple: z.number().positive().describe('R倍数（利確幅 / 損切り幅）'),
  entry_price: z.number().positive().describe('エントリー価格 [USD]'),
  stop_price: z.number().positive().describe('損切り価格 [USD]'),
  slippage_bps: z.number().min(0).max(1000).optional().default(10).describe('片道スリッページ [bps]'),
  fees_usd: z.number().min(0).optional().default(1).describe('1 トレードの固定手数料 [USD]'),
  capital: z.number().positive().optional().default(100_000).describe('口座残高 [USD]'),
  risk_fraction: z.number().gt(0).max(0.1).optional().default(0.005).describe('1 トレードのリスク割合'),
});

export type EstimateTradeEdgeInput = z.infer<typeof EstimateTradeEdgeInputSchema>;

// ── Output ──

const SimulationParametersSchema = z.object({
  win_probability: z.number(),
  reward_multiple: z.number(),
  risk_fraction: z.number(),
  trades_per_period: z.number().int(),
  periods: z.number().int(),
  fixed_cost_per_trade: z.number(),
  slippage_bps: z.number(),
  starting_capital: z.number(),
  num_simulations: z.number().int(),
});

export const RiskMetricsSchema = z.object({
  prob_2x: z.number().min(0).max(1),
  prob_3x: z.number().min(0).max(1),
  prob_loss: z.number().min(0).max(1),
  prob_dd_50: z.number().min(0).max(1),
  p95_max_drawdown: z.number().min(0).max(1).describe('95th percentile of per-path max drawdown (fraction)'),
  sharpe_ratio: z.number().describe('Annualized Sharpe of per-trade returns'),
  var_95: z.number().describe('5th percentile of final − start [USD]'),
  cvar_95: z.number().describe('Mean of final − start at or below VaR [USD]'),
  win_rate: z.number().min(0).max(1),
  profit_factor: z.number().nullable().describe('Gross profit / gross loss. null if no losing trades'),
  avg_win: z.number(),
  avg_loss: z.number(),
  largest_win: z.number(),
  largest_loss: z.number(),
  expected_r: z.number(),
});

const GateCheckSchema = z.object({
  name: z.enum(['prob_2x', 'p95_max_drawdown']),
  value: z.number(),
  threshold: z.number(),
  comparator: z.enum(['>', '<']),
  passed: z.boolean(),
});

const EquityBandSchema = z.object({
  trade: z.number().int(),
  mean: z.number(),
  p05: z.number(),
  p25: z.number(),
  p50: z.number(),
  p75: z.number(),
  p95: z.number(),
});

const WarningSchema = z.object({
  code: z.enum(['low_raw_edge', 'profit_factor_undefined', 'sharpe_undefined']),
  message: z.string(),
});

export const SimulationSummarySchema = z.object({
  parameters: SimulationParametersSchema,
  seed: z.number().int(),
  total_trades: z.number().int(),
  mean_final_equity: z.number(),
  median_final_equity: z.number(),
  std_final_equity: z.number(),
  min_equity: z.number(),
  max_equity: z.number(),
  risk_metrics: RiskMetricsSchema,
  gates: z.object({ checks: z.array(GateCheckSchema), all_passed: z.boolean() }),
  warnings: z.array(WarningSchema),
  timestamp: z.string(),
  computation_time_ms: z.number(),
});

export const SimulationResultSchema = SimulationSummarySchema.extend({
  final_equity_distribution: z.array(z.number()),
  sample_paths: z.array(z.array(z.number())),
  sample_indices: z.array(z.number().int()),
  bands: z.array(EquityBandSchema),
});

export const RunMonteCarloOutputSchema = z.union([
  z.object({
    ok: z.literal(true),
    summary: z.string(),
    data: z.union([SimulationResultSchema, SimulationSummarySchema]),
    meta: z.object({
      view: ResultViewEnum,
      seed: z.number().int(),
      computation_time_ms: z.number(),
      warnings: z.array(WarningSchema),
      svg: z.string().optional(),
    }),
  }),
  z.object({
    ok: z.literal(false),
    summary: z.string(),
    data: z.object({}).passthrough(),
    meta: z.object({ errorType: z.enum(['user', 'timeout', 'internal']) }).passthrough(),
  }),
]);
