import os from 'node:os';
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { defaultWorkerCount, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('未設定ならデフォルト', () => {
    const c = loadConfig({});
    expect(c.workers).toBe(Math.min(4, os.availableParallelism()));
    expect(c.timeoutMs).toBe(60_000);
    expect(c.periodsPerYear).toBe(52);
    expect(c.riskFreeRate).toBe(0);
    expect(c.sampleCap).toBe(15);
    expect(c.http).toEqual({
      enabled: false,
      port: undefined,
      allowedHosts: ['127.0.0.1', 'localhost'],
      allowedOrigins: [],
    });
    expect(c.logLevel).toBe('info');
    expect(c.logDir).toBeUndefined();
  });

  it('文字列の環境変数を数値・リストに変換する', () => {
    const c = loadConfig({
      MC_WORKERS: '0',
      MC_TIMEOUT_MS: '5000',
      MC_RISK_FREE_RATE: '0.04',
      PORT: '3000',
      MCP_ENABLE_HTTP: '1',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test',
      LOG_LEVEL: 'debug',
    });
    expect(c.workers).toBe(0);
    expect(c.timeoutMs).toBe(5000);
    expect(c.riskFreeRate).toBe(0.04);
    expect(c.http.enabled).toBe(true);
    expect(c.http.port).toBe(3000);
    expect(c.http.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(c.logLevel).toBe('debug');
  });

  it('PORT が無ければ MCP_ENABLE_HTTP=1 でも stdio', () => {
    expect(loadConfig({ MCP_ENABLE_HTTP: '1', PORT: '' }).http.enabled).toBe(false);
  });

  it('空文字は未設定として扱う', () => {
    expect(loadConfig({ MC_TIMEOUT_MS: '  ' }).timeoutMs).toBe(60_000);
  });

  it('不正値は黙ってデフォルトに戻さず throw', () => {
    expect(() => loadConfig({ MC_TIMEOUT_MS: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ MC_WORKERS: '-1' })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});

describe('defaultWorkerCount', () => {
  it('1 以上 4 以下', () => {
    expect(defaultWorkerCount()).toBeGreaterThanOrEqual(1);
    expect(defaultWorkerCount()).toBeLessThanOrEqual(4);
  });
});
