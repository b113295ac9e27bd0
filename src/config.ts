/**
 * 環境変数 → AppConfig
 *
 * 起動時に一度だけ zod で検証する。不正値はその場で throw（黙ってデフォルトに戻さない）。
 */

import os from 'node:os';
import { z } from 'zod';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const csv = (v: string) =>
	v
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);

const EnvSchema = z.object({
	MC_WORKERS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(64).optional()),
	MC_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(100).max(600_000).default(60_000)),
	MC_PERIODS_PER_YEAR: z.preprocess(blankToUndefined, z.coerce.number().positive().default(52)),
	MC_RISK_FREE_RATE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0)),
	MC_SAMPLE_CAP: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(50).default(15)),
	PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).optional()),
	MCP_ENABLE_HTTP: z.preprocess(blankToUndefined, z.enum(['0', '1']).default('0')),
	ALLOWED_HOSTS: z.preprocess(blankToUndefined, z.string().default('127.0.0.1,localhost')),
	ALLOWED_ORIGINS: z.preprocess(blankToUndefined, z.string().default('')),
	LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')),
	LOG_DIR: z.preprocess(blankToUndefined, z.string().optional()),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
	/** 0 で同一スレッド実行 */
	workers: number;
	timeoutMs: number;
	periodsPerYear: number;
	/** 年率 */
	riskFreeRate: number;
	sampleCap: number;
	http: {
		enabled: boolean;
		port?: number;
		allowedHosts: string[];
		allowedOrigins: string[];
	};
	logLevel: LogLevel;
	logDir?: string;
}

export function defaultWorkerCount(): number {
	return Math.min(4, os.availableParallelism());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const e = EnvSchema.parse(env);
	return {
		workers: e.MC_WORKERS ?? defaultWorkerCount(),
		timeoutMs: e.MC_TIMEOUT_MS,
		periodsPerYear: e.MC_PERIODS_PER_YEAR,
		riskFreeRate: e.MC_RISK_FREE_RATE,
		sampleCap: e.MC_SAMPLE_CAP,
		http: {
			enabled: e.MCP_ENABLE_HTTP === '1' && e.PORT != null,
			port: e.PORT,
			allowedHosts: csv(e.ALLOWED_HOSTS),
			allowedOrigins: csv(e.ALLOWED_ORIGINS),
		},
		logLevel: e.LOG_LEVEL,
		logDir: e.LOG_DIR,
	};
}

let cached: AppConfig | undefined;

/** プロセス全体で共有する設定（初回呼び出し時に読み込む） */
export function getConfig(): AppConfig {
	cached ??= loadConfig();
	return cached;
}
