import { describe, it, expect } from 'vitest';
import { ok, fail, failFromError, failFromValidation } from './result.js';
import { ComputeTimeoutError } from './error.js';

describe('ok', () => {
  it('ok: true の結果を生成する', () => {
    const result = ok('テスト成功', {}, {});
    expect(result.ok).toBe(true);
    expect(result.summary).toBe('テスト成功');
    expect(result.data).toEqual({});
    expect(result.meta).toEqual({});
  });
  it('data と meta を含める', () => {
    const result = ok('成功', { mean: 100 }, { seed: 7 });
    expect(result.data).toEqual({ mean: 100 });
    expect(result.meta).toEqual({ seed: 7 });
  });
});

describe('fail', () => {
  it('ok: false の結果を生成する', () => {
    const result = fail('エラー発生');
    expect(result.ok).toBe(false);
    expect(result.summary).toBe('Error: エラー発生');
    expect(result.data).toEqual({});
    expect(result.meta).toEqual({ errorType: 'user' });
  });
  it('カスタムエラータイプと meta を指定できる', () => {
    const result = fail('壊れた', 'internal', { tool: 'run_monte_carlo' });
    expect(result.meta).toEqual({ tool: 'run_monte_carlo', errorType: 'internal' });
  });
});

describe('failFromError', () => {
  it('通常のエラーから fail を生成する', () => {
    const result = failFromError(new Error('something broke'));
    expect(result.summary).toBe('Error: something broke');
    expect(result.meta.errorType).toBe('internal');
  });
  it('ComputeTimeoutError をタイムアウトとして処理する', () => {
    const result = failFromError(new ComputeTimeoutError(250));
    expect(result.summary).toBe('Error: タイムアウト (250ms)');
    expect(result.meta).toEqual({ timeoutMs: 250, errorType: 'timeout' });
  });
  it('ComputeTimeoutError 以外はタイムアウト扱いしない', () => {
    const result = failFromError(new DOMException('aborted', 'AbortError'));
    expect(result.summary).toBe('Error: aborted');
    expect(result.meta).toEqual({ errorType: 'internal' });
  });
  it('defaultType を指定できる', () => {
    expect(failFromError(new Error('bad'), { defaultType: 'user' }).meta).toEqual({ errorType: 'user' });
  });
  it('空メッセージは defaultMessage で補う', () => {
    const result = failFromError(new Error(''), { defaultMessage: 'unknown' });
    expect(result.summary).toBe('Error: unknown');
  });
});

describe('failFromValidation', () => {
  it('違反を全件列挙する', () => {
    const result = failFromValidation([
      { field: 'win_probability', message: 'win_probability: a' },
      { field: 'periods', message: 'periods: b' },
    ]);
    expect(result.summary).toBe('Error: パラメータが不正です (2件)\n- win_probability: a\n- periods: b');
    expect(result.meta.errorType).toBe('user');
    expect(result.meta.violations).toHaveLength(2);
    expect(result.meta.warnings).toEqual([]);
  });
});
