import { describe, it, expect } from 'vitest';
import { toDisplayTime, nowIso } from './datetime.js';

describe('toDisplayTime', () => {
  it('デフォルトは米国東部時間で ET 表記', () => {
    // 2023-11-14T22:13:20Z = 17:13:20 EST
    expect(toDisplayTime(1700000000000)).toBe('2023/11/14 17:13:20 ET');
  });
  it('UTC 指定で UTC と表示する', () => {
    expect(toDisplayTime(1700000000000, 'UTC')).toBe('2023/11/14 22:13:20 UTC');
  });
  it('undefined は現在時刻を返す', () => {
    expect(toDisplayTime(undefined)).toMatch(/^\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2} ET$/);
  });
});

describe('nowIso', () => {
  it('ISO8601 形式の文字列を返す', () => {
    expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});
