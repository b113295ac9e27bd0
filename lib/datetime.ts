/**
 * 日時変換ユーティリティ
 * dayjs ベースで実装
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';

// プラグイン有効化
dayjs.extend(utc);
dayjs.extend(timezone);

/** 米国株の取引所タイムゾーン */
export const MARKET_TZ = 'America/New_York';

/**
 * タイムスタンプを表示形式に変換
 * @param ts ミリ秒タイムスタンプ（未指定時は現在時刻）
 * @param tz タイムゾーン（デフォルト: America/New_York）
 * @returns "2025/01/15 09:30:00 ET" 形式
 */
export function toDisplayTime(ts: number | undefined, tz: string = MARKET_TZ): string | null {
	const d = dayjs(ts ?? Date.now()).tz(tz);
	if (!d.isValid()) return null;
	const tzShort = tz === 'UTC' ? 'UTC' : tz === MARKET_TZ ? 'ET' : tz;
	return `${d.format('YYYY/MM/DD HH:mm:ss')} ${tzShort}`;
}

/**
 * 現在時刻をISO8601形式で取得
 */
export function nowIso(): string {
	return dayjs().toISOString();
}
