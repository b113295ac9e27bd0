import { ZodError } from 'zod';
import { fail, failFromError, failFromValidation, ok } from '../../lib/result.js';
import { generateSummaryText, renderMonteCarloChart, runMonteCarlo } from '../../tools/risk/index.js';
import type { SimulationResult, SimulationWarning } from '../../tools/risk/index.js';
import { getConfig, type AppConfig } from '../config.js';
import { RunMonteCarloInputSchema, type RunMonteCarloInput } from '../schemas.js';
import { defineTool } from '../tool-definition.js';
import type { FailResult, OkResult } from '../types/domain.js';

export type MonteCarloView = RunMonteCarloInput['view'];

export type SimulationSummary = Omit<
  SimulationResult,
  'final_equity_distribution' | 'sample_paths' | 'sample_indices' | 'bands'
>;

export interface MonteCarloMeta {
  view: MonteCarloView;
  seed: number;
  computation_time_ms: number;
  warnings: SimulationWarning[];
  svg?: string;
}

export type MonteCarloToolResult = OkResult<SimulationResult | SimulationSummary, MonteCarloMeta> | FailResult;

/** view=summary では大きな配列を落とす */
export function selectView(result: SimulationResult, view: MonteCarloView): SimulationResult | SimulationSummary {
  if (view === 'full') return result;
  const { final_equity_distribution, sample_paths, sample_indices, bands, ...summary } = result;
  return summary;
}

function svgBlock(result: SimulationResult, svg: string): string {
  return [
    '',
    '--- Monte Carlo Chart (SVG) ---',
    `identifier: monte-carlo-${result.seed}`,
    `title: Monte Carlo ${result.parameters.num_simulations} paths (seed ${result.seed})`,
    'type: image/svg+xml',
    '',
    svg,
  ].join('\n');
}

export async function runMonteCarloTool(args: RunMonteCarloInput, config: AppConfig): Promise<MonteCarloToolResult> {
  const { seed, sample_cap, timeout_ms, include_svg, view, ...parameters } = args;
  try {
    const res = await runMonteCarlo(parameters, {
      seed,
      sampleCap: sample_cap ?? config.sampleCap,
      workers: config.workers,
      timeoutMs: timeout_ms ?? config.timeoutMs,
      periodsPerYear: config.periodsPerYear,
      riskFreeRate: config.riskFreeRate,
    });
    if (!res.ok) return failFromValidation(res.violations, res.warnings);

    const result = res.data;
    const svg = include_svg ? renderMonteCarloChart(result) : undefined;
    const summary = generateSummaryText(result) + (svg ? svgBlock(result, svg) : '');
    const meta: MonteCarloMeta = {
      view,
      seed: result.seed,
      computation_time_ms: result.computation_time_ms,
      warnings: res.warnings,
    };
    if (svg) meta.svg = svg;
    return ok(summary, selectView(result, view), meta);
  } catch (e) {
    if (e instanceof ZodError) {
      return fail(e.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '), 'user');
    }
    return failFromError(e);
  }
}

export const toolDef = defineTool({
  name: 'run_monte_carlo',
  description: `固定エッジのトレード戦略をモンテカルロ・シミュレーションし、リスク指標を返します。

【モデル】
各トレードで勝率 win_probability により勝敗を決定。
勝ち: +リスク額 × reward_multiple / 負け: −リスク額（リスク額 = 直前エクイティ × risk_fraction）
毎トレード fixed_cost_per_trade [USD] とリスク額 × slippage_bps/10000 を差し引く。エクイティは 0 で下限。

【出力】
- summary: 最終エクイティ統計、P(2x)/P(3x)/P(loss)、p95 最大DD、Sharpe、VaR/CVaR(95%)、勝率、PF、ゲート判定
- data: view=summary（デフォルト）は集計値のみ。view=full で最終エクイティ分布・サンプルパス・ファンチャート帯を含む
- include_svg: true でファンチャート + 分布ヒストグラムの SVG を返す

【入力例】
{ "win_probability": 0.45, "reward_multiple": 2.5, "risk_fraction": 0.005, "seed": 42 }

【注意】
- 範囲外のパラメータは全件まとめてエラーとして返します
- 同じ seed と入力なら結果は完全に一致します`,
  inputSchema: RunMonteCarloInputSchema,
  handler: async (args) => runMonteCarloTool(args, getConfig()),
});
