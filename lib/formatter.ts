/**
 * 表示用フォーマッタ（サマリーテキスト・チャートラベル用）
 */

/**
 * パーセンテージフォーマット
 * @param value 数値
 * @param opts.digits 小数桁数（デフォルト: 1）
 * @param opts.sign 正数に+を付けるか（デフォルト: false）
 * @param opts.multiply 100倍するか（デフォルト: false）。0-1小数→%変換に使う
 */
export function formatPercent(
	value: number | null | undefined,
	opts: { digits?: number; sign?: boolean; multiply?: boolean } = {},
): string {
	if (value == null || !Number.isFinite(value)) return 'n/a';
	const { digits = 1, sign = false, multiply = false } = opts;
	const v = multiply ? value * 100 : value;
	const prefix = sign && v >= 0 ? '+' : '';
	return `${prefix}${v.toFixed(digits)}%`;
}

/**
 * USD フォーマット
 * 12345.6 → $12,346 / -500 → -$500
 */
export function formatUsd(
	value: number | null | undefined,
	opts: { digits?: number; sign?: boolean } = {},
): string {
	if (value == null || !Number.isFinite(value)) return 'n/a';
	const { digits = 0, sign = false } = opts;
	const body = Math.abs(value).toLocaleString('en-US', {
		minimumFractionDigits: digits,
		maximumFractionDigits: digits,
	});
	const prefix = value < 0 ? '-' : sign ? '+' : '';
	return `${prefix}$${body}`;
}

/**
 * USD 短縮形（チャート軸用）
 * ≥1M → 1.25M / ≥1000 → 12.3K / それ未満 → 950
 */
export function formatUsdShort(value: number): string {
	const a = Math.abs(value);
	const s = value < 0 ? '-' : '';
	if (a >= 1_000_000) return `${s}$${(a / 1_000_000).toFixed(2)}M`;
	if (a >= 1000) return `${s}$${(a / 1000).toFixed(1)}K`;
	return `${s}$${a.toFixed(0)}`;
}

/** 比率（Sharpe・Profit Factor 等）。null は n/a */
export function formatRatio(value: number | null | undefined, digits = 2): string {
	if (value == null || !Number.isFinite(value)) return 'n/a';
	return value.toFixed(digits);
}
