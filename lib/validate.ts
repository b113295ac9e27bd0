import type { Violation } from '../src/types/domain.js';

export interface RangeRule {
	min: number;
	max: number;
	/** true の場合は整数のみ許可 */
	integer?: boolean;
}

/**
 * 数値が [min, max] に収まるか検査する。
 * 違反があれば Violation、問題なければ null。
 */
export function checkRange(field: string, value: number, rule: RangeRule): Violation | null {
	if (!Number.isFinite(value)) {
		return { field, message: `${field} は有限の数値で指定してください (受け取った値: ${value})` };
	}
	if (rule.integer && !Number.isInteger(value)) {
		return { field, message: `${field} は整数で指定してください (受け取った値: ${value})` };
	}
	if (value < rule.min || value > rule.max) {
		return {
			field,
			message: `${field} は ${rule.min} 以上 ${rule.max} 以下で指定してください (受け取った値: ${value})`,
		};
	}
	return null;
}

/**
 * 複数フィールドをまとめて検査する。最初の違反で打ち切らず全件を返す。
 */
export function collectViolations<K extends string>(
	values: Record<K, number>,
	rules: Record<K, RangeRule>
): Violation[] {
	const out: Violation[] = [];
	for (const field in rules) {
		const v = checkRange(field, values[field], rules[field]);
		if (v) out.push(v);
	}
	return out;
}
