/**
 * lib/gates.ts - 採用判定ゲート
 *
 * - モンテカルロゲート: prob_2x > 0.4
 * - ドローダウンゲート: p95_max_drawdown < 0.2
 */

import type { GateCheck, GateName, GateReport, RiskMetrics } from '../types.js';

interface GateRule {
  name: GateName;
  threshold: number;
  comparator: '>' | '<';
}

export const GATE_RULES: readonly GateRule[] = [
  { name: 'prob_2x', threshold: 0.4, comparator: '>' },
  { name: 'p95_max_drawdown', threshold: 0.2, comparator: '<' },
];

export function evaluateGates(metrics: Pick<RiskMetrics, GateName>): GateReport {
  const checks: GateCheck[] = GATE_RULES.map((rule) => {
    const value = metrics[rule.name];
    const passed = rule.comparator === '>' ? value > rule.threshold : value < rule.threshold;
    return { ...rule, value, passed };
  });
  return { checks, all_passed: checks.every((c) => c.passed) };
}
