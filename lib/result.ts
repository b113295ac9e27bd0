import type { OkResult, FailResult, ErrorType, Violation, ResultWarning } from '../src/types/domain.js';
import { getErrorMessage, isComputeTimeoutError } from './error.js';

export function ok<T, M = Record<string, unknown>>(summary: string, data: T, meta: M): OkResult<T, M> {
	return {
		ok: true,
		summary,
		data,
		meta,
	};
}

export function fail(
	message: string,
	type: ErrorType = 'user',
	meta: Record<string, unknown> = {}
): FailResult {
	return {
		ok: false,
		summary: `Error: ${message}`,
		data: {},
		meta: { ...meta, errorType: type },
	};
}

export interface FailFromErrorOptions {
	/** タイムアウト以外のデフォルトエラータイプ (default: 'internal') */
	defaultType?: ErrorType;
	/** getErrorMessage が空を返した場合のフォールバックメッセージ (default: 'internal error') */
	defaultMessage?: string;
}

/**
 * catch ブロックで捕捉したエラーから fail() 結果を生成する共通ヘルパー。
 *
 * - ComputeTimeoutError → 'timeout'（上限値は error 側が保持）
 * - その他 → defaultType + エラーメッセージ
 */
export function failFromError(err: unknown, opts: FailFromErrorOptions = {}): FailResult {
	const { defaultType = 'internal', defaultMessage = 'internal error' } = opts;

	if (isComputeTimeoutError(err)) {
		return fail(`タイムアウト (${err.timeoutMs}ms)`, 'timeout', { timeoutMs: err.timeoutMs });
	}
	return fail(getErrorMessage(err) || defaultMessage, defaultType);
}

/**
 * パラメータ検証の違反一覧から fail() 結果を生成する。
 * summary には全件を列挙し、meta.violations にフィールド単位で残す（UI のハイライト用）。
 */
export function failFromValidation(violations: Violation[], warnings: ResultWarning[] = []): FailResult {
	const lines = violations.map((v) => `- ${v.message}`);
	const message = `パラメータが不正です (${violations.length}件)\n${lines.join('\n')}`;
	return fail(message, 'user', { violations, warnings });
}
