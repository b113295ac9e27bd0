/**
 * lib/edge.ts - 1 トレードあたりのエッジ（R 単位）とサイジング
 *
 * シグナルスコアから勝率を見積もり、コスト控除後の期待 R を出す。
 * ここで得た勝率・R倍数をそのままシミュレーションの入力に渡せる。
 */

/** 期待 R の下限。これ未満はコスト負けとして扱う */
export const MIN_NET_EXPECTED_R = 0.05;

/** コスト控除前の期待値: p × R − (1 − p) */
export function expectedR(winProbability: number, rewardMultiple: number): number {
  return winProbability * rewardMultiple - (1 - winProbability);
}

/**
 * 往復スリッページと固定手数料を R 単位に換算
 * risk_per_share が 0 以下なら 0
 */
export function costsInR(slippageBps: number, feesUsd: number, entryPrice: number, riskPerShare: number): number {
  if (riskPerShare <= 0) return 0;
  const slippagePerShare = (slippageBps / 10000) * entryPrice * 2;
  return slippagePerShare / riskPerShare + feesUsd / riskPerShare;
}

export function netExpectedR(winProbability: number, rewardMultiple: number, costsR: number): number {
  return expectedR(winProbability, rewardMultiple) - costsR;
}

/**
 * シグナルスコア（0〜10）→ 勝率の見積もり（0.15〜0.65）
 * 線形ベースにシグモイドで緩やかな上乗せをする単調写像
 */
export function scoreToProbability(score: number): number {
  if (score <= 0) return 0.15;
  if (score >= 10) return 0.65;
  const n = score / 10;
  const base = 0.15 + 0.5 * n;
  const sigmoid = 1 / (1 + Math.exp(-2 * (n - 0.5)));
  return Math.min(0.65, Math.max(0.15, base + 0.05 * sigmoid));
}

export interface PositionSize {
  shares: number;
  notional: number;
}

/** リスク額 / 1 株あたりリスク で株数を決める（端数切り捨て） */
export function positionSize(entryPrice: number, stopPrice: number, capital: number, riskFraction: number): PositionSize {
  const riskPerShare = Math.abs(entryPrice - stopPrice);
  if (riskPerShare <= 0) return { shares: 0, notional: 0 };
  const shares = Math.floor((capital * riskFraction) / riskPerShare);
  return { shares, notional: shares * entryPrice };
}
