/**
 * ツール結果の共通エンベロープ
 *
 * 全ツールは ok/fail のいずれかを返す。summary は LLM 向けの 1〜数行のテキスト。
 */

export type ErrorType = 'user' | 'timeout' | 'internal';

export interface OkResult<T = Record<string, unknown>, M = Record<string, unknown>> {
	ok: true;
	summary: string;
	data: T;
	meta: M;
}

export type FailMeta = Record<string, unknown> & { errorType: ErrorType };

export interface FailResult {
	ok: false;
	summary: string;
	data: Record<string, never>;
	meta: FailMeta;
}

export type Result<T = Record<string, unknown>, M = Record<string, unknown>> = OkResult<T, M> | FailResult;

/** パラメータ検証で見つかった 1 件の違反 */
export interface Violation {
	field: string;
	message: string;
}

/** 結果に添える非致命的な注意（計算は完了している） */
export interface ResultWarning {
	code: string;
	message: string;
}
