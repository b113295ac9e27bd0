/**
 * render_monte_carlo_chart.ts - モンテカルロ結果のチャート描画
 *
 * 2 段構成:
 * - 上段: ファンチャート（p05–p95 / p25–p75 の帯 + 中央値 + 平均 + サンプルパス）
 * - 下段: 最終エクイティのヒストグラム（初期資金の位置に縦線）
 */

import { formatPercent, formatUsdShort } from '../../lib/formatter.js';
import type { EquityBand, SimulationResult } from './types.js';

// === 固定配色 ===
const COLORS = {
  background: '#1a1a2e',
  grid: '#2d2d44',
  text: '#e0e0e0',
  textMuted: '#888899',
  outerBand: 'rgba(96, 165, 250, 0.18)',
  innerBand: 'rgba(96, 165, 250, 0.35)',
  median: '#3b82f6',
  mean: '#fbbf24',
  sample: 'rgba(224, 224, 224, 0.25)',
  histogram: '#60a5fa',
  histogramLoss: '#f87171',
  startLine: '#9ca3af',
};

// === 固定レイアウト ===
const LAYOUT = {
  width: 800,
  height: 560,
  margin: { top: 60, right: 40, bottom: 40, left: 80 },
  fanHeight: 260,
  histHeight: 150,
  gapBetweenPanels: 50,
};

export const HISTOGRAM_BINS = 30;

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

/** 等幅ビンのヒストグラム。全値が同じ場合は 1 ビン */
export function buildHistogram(values: number[], bins = HISTOGRAM_BINS): HistogramBin[] {
  if (values.length === 0) return [];
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (max === min) return [{ from: min, to: max, count: values.length }];
  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + width * i,
    to: i === bins - 1 ? max : min + width * (i + 1),
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(bins - 1, Math.floor((v - min) / width));
    out[idx].count++;
  }
  return out;
}

function generateYTicks(min: number, max: number, count: number): number[] {
  const step = (max - min) / (count - 1);
  return Array.from({ length: count }, (_, i) => min + step * i);
}

function linePath(points: Array<[number, number]>): string {
  return points.map(([x, y], i) => `${i === 0 ? 'M' : 'L'}${x.toFixed(1)},${y.toFixed(1)}`).join(' ');
}

/** 上側を左→右、下側を右→左でつないだ帯 */
function bandPath(bands: EquityBand[], upper: keyof EquityBand, lower: keyof EquityBand, x: (t: number) => number, y: (v: number) => number): string {
  const top = bands.map((b): [number, number] => [x(b.trade), y(b[upper])]);
  const bottom = [...bands].reverse().map((b): [number, number] => [x(b.trade), y(b[lower])]);
  return `${linePath([...top, ...bottom])} Z`;
}

/**
 * チャート描画
 */
export function renderMonteCarloChart(result: SimulationResult): string {
  const { width, height, margin, fanHeight, histHeight, gapBetweenPanels } = LAYOUT;
  const { parameters: p, bands, risk_metrics: m } = result;
  const start = p.starting_capital;
  const plotWidth = width - margin.left - margin.right;

  const fanTop = margin.top;
  const fanBottom = fanTop + fanHeight;
  const histTop = fanBottom + gapBetweenPanels;
  const histBottom = histTop + histHeight;

  const xScale = (trade: number) => margin.left + (trade / Math.max(1, result.total_trades)) * plotWidth;

  // エクイティスケール（p95 帯とサンプルパスの最大まで）
  let eqMin = start;
  let eqMax = start;
  for (const b of bands) {
    eqMin = Math.min(eqMin, b.p05);
    eqMax = Math.max(eqMax, b.p95);
  }
  const checkpoints = bands.map((b) => b.trade);
  for (const path of result.sample_paths) {
    for (const t of checkpoints) {
      const v = path[t];
      if (v < eqMin) eqMin = v;
      if (v > eqMax) eqMax = v;
    }
  }
  const eqRange = Math.max(eqMax - eqMin, start * 0.01);
  const eqYScale = (v: number) => fanBottom - ((v - eqMin) / eqRange) * fanHeight;

  // SVG構築（レスポンシブ: viewBox のみ指定）
  const svg: string[] = [];
  svg.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" style="max-width:100%;height:auto;">`);
  svg.push(`<rect width="${width}" height="${height}" fill="${COLORS.background}"/>`);

  // タイトル
  svg.push(`<text x="${width / 2}" y="20" fill="${COLORS.text}" font-size="14" font-weight="bold" text-anchor="middle">`);
  svg.push(`Monte Carlo (${p.num_simulations} paths × ${result.total_trades} trades)</text>`);
  svg.push(`<text x="${width / 2}" y="38" fill="${COLORS.textMuted}" font-size="11" text-anchor="middle">`);
  svg.push(
    `p=${p.win_probability} | R=${p.reward_multiple} | risk=${formatPercent(p.risk_fraction, { multiply: true, digits: 2 })} | P(2x): ${formatPercent(m.prob_2x, { multiply: true })} | DD p95: -${formatPercent(m.p95_max_drawdown, { multiply: true })}</text>`
  );

  // === ファンチャート ===
  svg.push(`<text x="${margin.left}" y="${fanTop - 8}" fill="${COLORS.text}" font-size="10" font-weight="bold">Equity (USD)</text>`);
  for (const tick of generateYTicks(eqMin, eqMax, 5)) {
    const y = eqYScale(tick);
    svg.push(`<line x1="${margin.left}" y1="${y.toFixed(1)}" x2="${width - margin.right}" y2="${y.toFixed(1)}" stroke="${COLORS.grid}" stroke-dasharray="2,2"/>`);
    svg.push(`<text x="${margin.left - 5}" y="${(y + 3).toFixed(1)}" fill="${COLORS.textMuted}" font-size="8" text-anchor="end">${formatUsdShort(tick)}</text>`);
  }

  if (bands.length > 1) {
    svg.push(`<path d="${bandPath(bands, 'p95', 'p05', xScale, eqYScale)}" fill="${COLORS.outerBand}"/>`);
    svg.push(`<path d="${bandPath(bands, 'p75', 'p25', xScale, eqYScale)}" fill="${COLORS.innerBand}"/>`);
  }

  // サンプルパス（チェックポイントで間引き）
  for (const path of result.sample_paths) {
    const pts = checkpoints.map((t): [number, number] => [xScale(t), eqYScale(path[t])]);
    svg.push(`<path d="${linePath(pts)}" fill="none" stroke="${COLORS.sample}" stroke-width="0.8"/>`);
  }

  svg.push(
    `<path d="${linePath(bands.map((b): [number, number] => [xScale(b.trade), eqYScale(b.p50)]))}" fill="none" stroke="${COLORS.median}" stroke-width="2"/>`
  );
  svg.push(
    `<path d="${linePath(bands.map((b): [number, number] => [xScale(b.trade), eqYScale(b.mean)]))}" fill="none" stroke="${COLORS.mean}" stroke-width="1.5" stroke-dasharray="4,2"/>`
  );

  svg.push(`<text x="${width - margin.right}" y="${fanTop - 8}" fill="${COLORS.median}" font-size="9" text-anchor="end">median</text>`);
  svg.push(`<text x="${width - margin.right - 45}" y="${fanTop - 8}" fill="${COLORS.mean}" font-size="9" text-anchor="end">mean</text>`);

  // X軸ラベル（トレード番号）
  for (let i = 0; i <= 4; i++) {
    const t = Math.round((result.total_trades * i) / 4);
    svg.push(`<text x="${xScale(t).toFixed(1)}" y="${fanBottom + 12}" fill="${COLORS.textMuted}" font-size="8" text-anchor="middle">${t}</text>`);
  }

  // === ヒストグラム ===
  const hist = buildHistogram(result.final_equity_distribution);
  svg.push(`<text x="${margin.left}" y="${histTop - 8}" fill="${COLORS.text}" font-size="10" font-weight="bold">Final equity distribution</text>`);
  if (hist.length) {
    const lo = hist[0].from;
    const hi = hist[hist.length - 1].to;
    const span = Math.max(hi - lo, 1);
    const maxCount = Math.max(...hist.map((b) => b.count));
    const hx = (v: number) => margin.left + ((v - lo) / span) * plotWidth;
    const barWidth = Math.max(1, plotWidth / hist.length - 1);
    for (const [i, bin] of hist.entries()) {
      const h = (bin.count / maxCount) * histHeight;
      const x = hist.length === 1 ? margin.left : margin.left + (i * plotWidth) / hist.length;
      const fill = bin.to <= start ? COLORS.histogramLoss : COLORS.histogram;
      svg.push(`<rect x="${x.toFixed(1)}" y="${(histBottom - h).toFixed(1)}" width="${(hist.length === 1 ? plotWidth : barWidth).toFixed(1)}" height="${h.toFixed(1)}" fill="${fill}"/>`);
    }
    if (start >= lo && start <= hi) {
      const sx = hx(start).toFixed(1);
      svg.push(`<line x1="${sx}" y1="${histTop}" x2="${sx}" y2="${histBottom}" stroke="${COLORS.startLine}" stroke-dasharray="3,3"/>`);
    }
    svg.push(`<text x="${margin.left}" y="${histBottom + 12}" fill="${COLORS.textMuted}" font-size="8" text-anchor="start">${formatUsdShort(lo)}</text>`);
    svg.push(`<text x="${width - margin.right}" y="${histBottom + 12}" fill="${COLORS.textMuted}" font-size="8" text-anchor="end">${formatUsdShort(hi)}</text>`);
  }

  svg.push('</svg>');
  return svg.join('\n');
}
