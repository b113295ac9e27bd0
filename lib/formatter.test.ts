import { describe, it, expect } from 'vitest';
import { formatPercent, formatUsd, formatUsdShort, formatRatio } from './formatter.js';

describe('formatPercent', () => {
  it('デフォルトは小数1桁の % 表記', () => {
    expect(formatPercent(1.5)).toBe('1.5%');
  });
  it('sign: true で正数に + を付ける', () => {
    expect(formatPercent(1.5, { sign: true })).toBe('+1.5%');
  });
  it('負数は + なし', () => {
    expect(formatPercent(-2.3, { sign: true })).toBe('-2.3%');
  });
  it('multiply: true で 100 倍する', () => {
    expect(formatPercent(0.05, { multiply: true })).toBe('5.0%');
  });
  it('null は n/a を返す', () => {
    expect(formatPercent(null)).toBe('n/a');
  });
});

describe('formatUsd', () => {
  it('桁区切り付きで整数に丸める', () => {
    expect(formatUsd(12345.6)).toBe('$12,346');
  });
  it('負数は -$ で始まる', () => {
    expect(formatUsd(-500)).toBe('-$500');
  });
  it('sign: true で正数に + を付ける', () => {
    expect(formatUsd(1200, { sign: true })).toBe('+$1,200');
  });
  it('digits で小数桁数を指定できる', () => {
    expect(formatUsd(1.5, { digits: 2 })).toBe('$1.50');
  });
  it('NaN は n/a', () => {
    expect(formatUsd(NaN)).toBe('n/a');
  });
});

describe('formatUsdShort', () => {
  it('100万以上は M 表記', () => {
    expect(formatUsdShort(1_250_000)).toBe('$1.25M');
  });
  it('1000以上は K 表記', () => {
    expect(formatUsdShort(12_345)).toBe('$12.3K');
  });
  it('1000未満はそのまま', () => {
    expect(formatUsdShort(950)).toBe('$950');
  });
});

describe('formatRatio', () => {
  it('小数2桁', () => {
    expect(formatRatio(1.23456)).toBe('1.23');
  });
  it('null は n/a', () => {
    expect(formatRatio(null)).toBe('n/a');
  });
});
