/**
 * lib/parameters.ts - パラメータ定義と検証
 *
 * 形（全フィールドが有限の数値か）は zod で検査し、壊れた入力は ZodError を投げる。
 * 範囲・整数チェックは PARAMETER_CONFIG のテーブルで行い、違反を全件集める。
 */

import { z } from 'zod';
import { collectViolations, type RangeRule } from '../../../lib/validate.js';
import type { Violation } from '../../../src/types/domain.js';
import type { SimulationParameters, ParameterName, SimulationWarning } from '../types.js';

export interface ParameterConfig extends RangeRule {
  default: number;
  label: string;
  unit?: string;
  description: string;
}

export const PARAMETER_CONFIG: Record<ParameterName, ParameterConfig> = {
  win_probability: {
    min: 0.1,
    max: 0.9,
    default: 0.45,
    label: '勝率',
    description: '1 トレードが勝ちになる確率。45% はシステマティック戦略として典型的な水準',
  },
  reward_multiple: {
    min: 1,
    max: 5,
    default: 2.5,
    label: 'R倍数',
    description: '勝ちトレードの利益をリスク額の何倍とするか。2.5:1 は非対称性のある良いセットアップ',
  },
  risk_fraction: {
    min: 0.001,
    max: 0.05,
    default: 0.005,
    label: '1トレードのリスク',
    description: '直前エクイティに対する 1 トレードの許容損失割合。0.5% は保守的なサイジング',
  },
  trades_per_period: {
    min: 1,
    max: 50,
    integer: true,
    default: 10,
    label: '期間あたりトレード数',
    unit: '回',
    description: '1 期間（週）あたりのトレード回数。週 10 回はアクティブだが管理可能な頻度',
  },
  periods: {
    min: 4,
    max: 260,
    integer: true,
    default: 52,
    label: '期間数',
    unit: '週',
    description: 'シミュレーションする期間数。52 週 = 1 年',
  },
  fixed_cost_per_trade: {
    min: 0,
    max: 10,
    default: 1,
    label: '固定コスト',
    unit: 'USD',
    description: '1 トレードあたりの固定手数料。$1 は一般的なブローカー手数料',
  },
  slippage_bps: {
    min: 0,
    max: 100,
    default: 10,
    label: 'スリッページ',
    unit: 'bps',
    description: 'リスク額に対するスリッページコスト。10bps は現実的な市場インパクト',
  },
  starting_capital: {
    min: 1000,
    max: 1_000_000,
    default: 10_000,
    label: '初期資金',
    unit: 'USD',
    description: 'シミュレーション開始時の口座残高',
  },
  num_simulations: {
    min: 100,
    max: 5000,
    integer: true,
    default: 1000,
    label: '試行回数',
    unit: 'パス',
    description: 'モンテカルロのパス数。1,000 パスで十分な統計的検出力が得られる',
  },
};

export const DEFAULT_PARAMETERS: Readonly<SimulationParameters> = Object.freeze({
  win_probability: PARAMETER_CONFIG.win_probability.default,
  reward_multiple: PARAMETER_CONFIG.reward_multiple.default,
  risk_fraction: PARAMETER_CONFIG.risk_fraction.default,
  trades_per_period: PARAMETER_CONFIG.trades_per_period.default,
  periods: PARAMETER_CONFIG.periods.default,
  fixed_cost_per_trade: PARAMETER_CONFIG.fixed_cost_per_trade.default,
  slippage_bps: PARAMETER_CONFIG.slippage_bps.default,
  starting_capital: PARAMETER_CONFIG.starting_capital.default,
  num_simulations: PARAMETER_CONFIG.num_simulations.default,
});

const finite = z.number().finite();

export const SimulationParametersShape = z.object({
  win_probability: finite,
  reward_multiple: finite,
  risk_fraction: finite,
  trades_per_period: finite,
  periods: finite,
  fixed_cost_per_trade: finite,
  slippage_bps: finite,
  starting_capital: finite,
  num_simulations: finite,
});

/** 32bit の符号なし整数 seed */
export const SeedSchema = z
  .number()
  .int()
  .min(0)
  .max(2 ** 32 - 1);

export type ValidationOutcome =
  | { ok: true; value: Readonly<SimulationParameters>; warnings: SimulationWarning[] }
  | { ok: false; violations: Violation[]; warnings: SimulationWarning[] };

/** 勝率 × R倍数 が 1 未満ならコスト控除前でも期待値が薄い */
export function edgeWarnings(p: Pick<SimulationParameters, 'win_probability' | 'reward_multiple'>): SimulationWarning[] {
  const rawEdge = p.win_probability * p.reward_multiple;
  if (rawEdge >= 1) return [];
  return [
    {
      code: 'low_raw_edge',
      message: `勝率 × R倍数 = ${rawEdge.toFixed(3)} (< 1.0)。コスト控除前でもエッジが小さい設定です`,
    },
  ];
}

/**
 * 入力候補を検証する。
 * - 形が壊れている（欠損・文字列・NaN・Infinity）場合は ZodError を投げる
 * - 範囲違反は全件を violations に集めて ok: false
 * - 正常時は同じ値を凍結したコピーを返す
 */
export function validateParameters(candidate: unknown): ValidationOutcome {
  const parsed = SimulationParametersShape.parse(candidate);
  const rules: Record<ParameterName, RangeRule> = PARAMETER_CONFIG;
  const violations = collectViolations(parsed, rules);
  const warnings = edgeWarnings(parsed);
  if (violations.length) return { ok: false, violations, warnings };
  return { ok: true, value: Object.freeze({ ...parsed }), warnings };
}

/** 総イベント数（= 1 パスのトレード数） */
export function totalTrades(p: Pick<SimulationParameters, 'trades_per_period' | 'periods'>): number {
  return p.trades_per_period * p.periods;
}
