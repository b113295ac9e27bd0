/**
 * CLI ツール共通ユーティリティ
 *
 * 引数パース・結果出力・エラーハンドリングを統一する。
 */

// ---------------------------------------------------------------------------
// 引数パース
// ---------------------------------------------------------------------------

export type CliFlags = Record<string, string | boolean>;

/**
 * process.argv から位置引数とフラグを分離する。
 *
 * 位置引数: `--` で始まらないもの
 * フラグ: `--key` → `{ key: true }`, `--key=val` → `{ key: "val" }`
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): {
  positional: string[];
  flags: CliFlags;
} {
  const positional: string[] = [];
  const flags: CliFlags = {};

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eqIndex = arg.indexOf('=');
      if (eqIndex === -1) {
        flags[arg.slice(2)] = true;
      } else {
        flags[arg.slice(2, eqIndex)] = arg.slice(eqIndex + 1);
      }
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

/**
 * 位置引数を整数として取得する。無い場合や NaN の場合は defaultValue を返す。
 */
export function intArg(value: string | undefined, defaultValue: number): number {
  if (value == null) return defaultValue;
  const n = parseInt(value, 10);
  return Number.isFinite(n) ? n : defaultValue;
}

/**
 * `--key=<number>` を数値で取り出す。未指定なら undefined。
 * 数値にならない値は黙って捨てずに throw する。
 */
export function numberFlag(flags: CliFlags, key: string): number | undefined {
  const raw = flags[key];
  if (raw == null) return undefined;
  if (typeof raw !== 'string' || raw.trim() === '') throw new Error(`--${key} には数値を指定してください`);
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${key} には数値を指定してください (受け取った値: ${raw})`);
  return n;
}

/** `--key` / `--key=true|1` → true, `--key=false|0` → false, 未指定 → undefined */
export function booleanFlag(flags: CliFlags, key: string): boolean | undefined {
  const raw = flags[key];
  if (raw == null) return undefined;
  if (raw === true || raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`--${key} は true/false で指定してください (受け取った値: ${String(raw)})`);
}

// ---------------------------------------------------------------------------
// CLI ランナー
// ---------------------------------------------------------------------------

/**
 * CLI ツールのエントリポイントを統一的にラップする。
 *
 * - fn が ok フィールドを持つオブジェクトを返す場合: JSON を stdout に出力し、ok でなければ exit(1)
 * - 例外発生時: stderr にメッセージを出力し exit(1)
 */
export function runCli(fn: () => Promise<{ ok: boolean }>): void {
  fn()
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
      if (!result.ok) process.exit(1);
    })
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
