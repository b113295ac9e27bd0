/**
 * エラー関連ユーティリティ
 */

/** unknown 型のエラーからメッセージ文字列を取り出す */
export function getErrorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}

/** シミュレーション実行中に発生するエラーの基底クラス */
export class SimulationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'SimulationError';
	}
}

/**
 * 呼び出し側が指定した計算時間の上限を超えた。
 * 部分結果は返さない（途中までのアンサンブルで統計を出すと偏るため）。
 */
export class ComputeTimeoutError extends SimulationError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`simulation exceeded ${timeoutMs}ms`);
		this.name = 'ComputeTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

/** エクイティや統計量が有限値でなくなった */
export class NumericOverflowError extends SimulationError {
	readonly field: string;

	constructor(field: string, value: number) {
		super(`non-finite value in ${field}: ${value}`);
		this.name = 'NumericOverflowError';
		this.field = field;
	}
}

export function isComputeTimeoutError(err: unknown): err is ComputeTimeoutError {
	return err instanceof ComputeTimeoutError;
}
