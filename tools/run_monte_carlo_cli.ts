import 'dotenv/config';
import { configureLogger } from '../lib/logger.js';
import { runMonteCarloTool } from '../src/handlers/runMonteCarloHandler.js';
import { getConfig } from '../src/config.js';
import { RunMonteCarloInputSchema } from '../src/schemas.js';
import { booleanFlag, intArg, numberFlag, parseArgs, runCli } from './lib/cli-utils.js';

// 例: tsx tools/run_monte_carlo_cli.ts 2000 --win_probability=0.5 --seed=42 --view=full --include_svg
runCli(async () => {
  const { positional, flags } = parseArgs();
  const input = RunMonteCarloInputSchema.parse({
    num_simulations: positional[0] != null ? intArg(positional[0], 1000) : numberFlag(flags, 'num_simulations'),
    win_probability: numberFlag(flags, 'win_probability'),
    reward_multiple: numberFlag(flags, 'reward_multiple'),
    risk_fraction: numberFlag(flags, 'risk_fraction'),
    trades_per_period: numberFlag(flags, 'trades_per_period'),
    periods: numberFlag(flags, 'periods'),
    fixed_cost_per_trade: numberFlag(flags, 'fixed_cost_per_trade'),
    slippage_bps: numberFlag(flags, 'slippage_bps'),
    starting_capital: numberFlag(flags, 'starting_capital'),
    seed: numberFlag(flags, 'seed'),
    sample_cap: numberFlag(flags, 'sample_cap'),
    timeout_ms: numberFlag(flags, 'timeout_ms'),
    include_svg: booleanFlag(flags, 'include_svg'),
    view: typeof flags.view === 'string' ? flags.view : undefined,
  });
  const config = getConfig();
  configureLogger(config);
  return runMonteCarloTool(input, config);
});
