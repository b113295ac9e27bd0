/**
 * 構造化ロガー（winston）
 *
 * stdout は MCP の stdio トランスポートが占有するため、コンソール出力は全レベル stderr に流す。
 * レベルとファイル出力は起動時に configureLogger で AppConfig から設定する。
 */

import path from 'node:path';
import * as winston from 'winston';
import type { AppConfig } from '../src/config.js';
import { getErrorMessage } from './error.js';

export const LOG_FILE_NAME = 'mcp.jsonl';

export const logger = winston.createLogger({
	level: 'info',
	format: winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.json()
	),
	defaultMeta: { service: 'risk-sim-mcp' },
	transports: [
		new winston.transports.Console({
			stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
		}),
	],
	silent: process.env.NODE_ENV === 'test',
});

/**
 * レベルを設定し、logDir があれば <logDir>/mcp.jsonl にも書き出す。
 * 呼び直すとファイル出力は置き換わる。
 */
export function configureLogger(config: Pick<AppConfig, 'logLevel' | 'logDir'>): void {
	logger.level = config.logLevel;
	for (const t of [...logger.transports]) {
		if (t instanceof winston.transports.File) logger.remove(t);
	}
	if (config.logDir) {
		logger.add(new winston.transports.File({ filename: path.join(config.logDir, LOG_FILE_NAME) }));
	}
}

/** 結果オブジェクトから ok/summary 程度だけ抜き出す（巨大な配列はログに残さない） */
function digestResult(result: unknown): Record<string, unknown> {
	if (typeof result !== 'object' || result === null) return { type: typeof result };
	const out: Record<string, unknown> = {};
	if ('ok' in result) out.ok = result.ok;
	if ('summary' in result && typeof result.summary === 'string') {
		out.summary = result.summary.length > 300 ? `${result.summary.slice(0, 300)}…` : result.summary;
	}
	return out;
}

export function logToolRun(args: { tool: string; input: unknown; result: unknown; ms: number }): void {
	logger.info('tool_run', {
		tool: args.tool,
		input: args.input,
		result: digestResult(args.result),
		ms: args.ms,
	});
}

export function logError(tool: string, err: unknown, input?: unknown): void {
	logger.error('tool_error', {
		tool,
		input,
		message: getErrorMessage(err),
		stack: err instanceof Error ? err.stack : undefined,
	});
}
