/**
 * 数値演算ユーティリティ
 *
 * パーセンタイルは全て「最近接順位間の線形補間」で統一する。
 * ソート済み配列 x（長さ n）に対し h = (n - 1) * p として
 *   x[floor(h)] + (h - floor(h)) * (x[floor(h) + 1] - x[floor(h)])
 */

/**
 * 配列の標準偏差（母標準偏差）を計算
 * @returns 標準偏差、空配列の場合は0
 */
export function stddev(values: ArrayLike<number>): number {
	const n = values.length;
	if (n === 0) return 0;
	let sum = 0;
	for (let i = 0; i < n; i++) sum += values[i];
	const mean = sum / n;
	let sq = 0;
	for (let i = 0; i < n; i++) sq += (values[i] - mean) * (values[i] - mean);
	return Math.sqrt(Math.max(0, sq / n));
}

/**
 * ソート済み配列のパーセンタイル（線形補間）
 * @param sorted 昇順ソート済み配列
 * @param p 0〜1
 * @returns 空配列の場合はnull
 */
export function percentileSorted(sorted: ArrayLike<number>, p: number): number | null {
	const n = sorted.length;
	if (n === 0) return null;
	if (n === 1) return sorted[0];
	const q = Math.min(1, Math.max(0, p));
	const h = (n - 1) * q;
	const lo = Math.floor(h);
	const hi = Math.min(n - 1, lo + 1);
	return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

/** 昇順ソート済みのコピーを返す（TypedArray の数値ソートを使う） */
export function sortedCopy(values: ArrayLike<number>): Float64Array {
	return Float64Array.from(values).sort();
}
