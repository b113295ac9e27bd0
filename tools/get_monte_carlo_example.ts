import { ok } from '../lib/result.js';
import { DEFAULT_PARAMETERS, PARAMETER_CONFIG, totalTrades } from './risk/lib/parameters.js';
import type { ParameterName, SimulationParameters } from './risk/types.js';
import { GetMonteCarloExampleInputSchema } from '../src/schemas.js';
import { defineTool } from '../src/tool-definition.js';
import type { OkResult } from '../src/types/domain.js';

export interface ParameterGuide {
  name: ParameterName;
  label: string;
  min: number;
  max: number;
  integer: boolean;
  unit?: string;
  default: number;
  explanation: string;
}

export interface MonteCarloExample {
  example_request: SimulationParameters;
  parameters: ParameterGuide[];
}

const ORDER: readonly ParameterName[] = [
  'win_probability',
  'reward_multiple',
  'risk_fraction',
  'trades_per_period',
  'periods',
  'fixed_cost_per_trade',
  'slippage_bps',
  'starting_capital',
  'num_simulations',
];

export default function getMonteCarloExample(): OkResult<MonteCarloExample> {
  const parameters = ORDER.map((name): ParameterGuide => {
    const c = PARAMETER_CONFIG[name];
    return {
      name,
      label: c.label,
      min: c.min,
      max: c.max,
      integer: c.integer ?? false,
      unit: c.unit,
      default: c.default,
      explanation: c.description,
    };
  });

  const lines = [
    'run_monte_carlo の入力例（このまま渡せます）',
    JSON.stringify(DEFAULT_PARAMETERS),
    `1 パス ${totalTrades(DEFAULT_PARAMETERS)} トレード × ${DEFAULT_PARAMETERS.num_simulations} パス`,
    '',
    ...parameters.map((p) => `- ${p.name} (${p.label}): [${p.min}, ${p.max}] default ${p.default}。${p.explanation}`),
  ];

  return ok(lines.join('\n'), { example_request: { ...DEFAULT_PARAMETERS }, parameters }, { count: parameters.length });
}

// ── MCP ツール定義（tool-registry から自動収集） ──
export const toolDef = defineTool({
  name: 'get_monte_carlo_example',
  description: 'run_monte_carlo の入力例と各パラメータの範囲・デフォルト・解説を返す。',
  inputSchema: GetMonteCarloExampleInputSchema,
  handler: async () => getMonteCarloExample(),
});
