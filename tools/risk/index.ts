/**
 * risk/index.ts - モンテカルロ・リスクシミュレーションのエクスポート
 */

export { default as runMonteCarlo, generateSummaryText, RUN_DEFAULTS, MAX_SAMPLE_CAP } from './run_monte_carlo.js';
export type { RunMonteCarloOptions, RunMonteCarloResult } from './run_monte_carlo.js';
export { renderMonteCarloChart } from './render_monte_carlo_chart.js';
export { validateParameters, PARAMETER_CONFIG, DEFAULT_PARAMETERS } from './lib/parameters.js';
export { evaluateGates } from './lib/gates.js';
export * from './lib/edge.js';
export type * from './types.js';
