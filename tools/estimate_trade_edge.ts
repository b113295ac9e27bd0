import { fail, ok } from '../lib/result.js';
import { formatRatio, formatUsd, formatPercent } from '../lib/formatter.js';
import {
  MIN_NET_EXPECTED_R,
  costsInR,
  expectedR,
  netExpectedR,
  positionSize,
  scoreToProbability,
} from './risk/lib/edge.js';
import { EstimateTradeEdgeInputSchema, type EstimateTradeEdgeInput } from '../src/schemas.js';
import { defineTool } from '../src/tool-definition.js';
import type { FailResult, OkResult } from '../src/types/domain.js';

export interface TradeEdgeEstimate {
  win_probability: number;
  /** signal_score から換算した場合 true */
  probability_from_score: boolean;
  reward_multiple: number;
  risk_per_share: number;
  expected_r: number;
  costs_r: number;
  net_expected_r: number;
  /** net_expected_r が下限以上か */
  passes_min_edge: boolean;
  position: { shares: number; notional: number };
}

export default function estimateTradeEdge(input: EstimateTradeEdgeInput): OkResult<TradeEdgeEstimate> | FailResult {
  const fromScore = input.win_probability == null;
  let p: number;
  if (input.win_probability != null) {
    p = input.win_probability;
  } else if (input.signal_score != null) {
    p = scoreToProbability(input.signal_score);
  } else {
    return fail('signal_score か win_probability のどちらかを指定してください', 'user');
  }

  const riskPerShare = Math.abs(input.entry_price - input.stop_price);
  if (riskPerShare <= 0) {
    return fail('entry_price と stop_price が同じです（1 株あたりリスクが 0）', 'user');
  }

  const grossR = expectedR(p, input.reward_multiple);
  const costsR = costsInR(input.slippage_bps, input.fees_usd, input.entry_price, riskPerShare);
  const netR = netExpectedR(p, input.reward_multiple, costsR);
  const position = positionSize(input.entry_price, input.stop_price, input.capital, input.risk_fraction);

  const data: TradeEdgeEstimate = {
    win_probability: p,
    probability_from_score: fromScore,
    reward_multiple: input.reward_multiple,
    risk_per_share: riskPerShare,
    expected_r: grossR,
    costs_r: costsR,
    net_expected_r: netR,
    passes_min_edge: netR >= MIN_NET_EXPECTED_R,
    position,
  };

  const lines = [
    `勝率: ${formatPercent(p, { multiply: true })}${fromScore ? ` (score ${input.signal_score} から換算)` : ''} / ${input.reward_multiple}R`,
    `期待値: ${formatRatio(grossR, 3)}R − コスト ${formatRatio(costsR, 3)}R = ${formatRatio(netR, 3)}R ${data.passes_min_edge ? '✓' : `✗ (下限 ${MIN_NET_EXPECTED_R}R 未満)`}`,
    `サイズ: ${position.shares} 株 (${formatUsd(position.notional)}) / 1 株リスク ${formatUsd(riskPerShare, { digits: 2 })}`,
  ];

  return ok(lines.join('\n'), data, {});
}

// ── MCP ツール定義（tool-registry から自動収集） ──
export const toolDef = defineTool({
  name: 'estimate_trade_edge',
  description:
    'シグナルスコア（または勝率）・R倍数・エントリー/損切り価格から、コスト控除後の期待R と推奨株数を見積もる。結果の勝率と R倍数は run_monte_carlo の入力にそのまま使える。',
  inputSchema: EstimateTradeEdgeInputSchema,
  handler: async (args) => estimateTradeEdge(args),
});
