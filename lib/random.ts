/**
 * シード付き乱数
 *
 * シミュレーションは Math.random を直接使わず、ここで生成した関数を注入する。
 * パスごとに deriveSeed(seed, index) で独立したサブ系列を作るので、
 * ワーカー分割の仕方に関係なく同じ seed から同じアンサンブルが得られる。
 */

import { randomInt } from 'node:crypto';

/** [0, 1) の一様乱数を返す関数 */
export type Rng = () => number;

/** Mulberry32（32bit 状態の軽量 PRNG） */
export function mulberry32(seed: number): Rng {
	let a = seed >>> 0;
	return () => {
		a |= 0;
		a = (a + 0x6d2b79f5) | 0;
		let t = Math.imul(a ^ (a >>> 15), 1 | a);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * 親 seed とパス番号から子 seed を導出（murmur3 の fmix32）
 * 隣接する index でも出力が大きく散る。
 */
export function deriveSeed(seed: number, index: number): number {
	let h = (seed ^ Math.imul(index + 1, 0x9e3779b9)) >>> 0;
	h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
	h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
	return (h ^ (h >>> 16)) >>> 0;
}

/** seed 未指定時に使う 32bit の乱数 seed */
export function randomSeed(): number {
	return randomInt(0, 2 ** 32);
}
