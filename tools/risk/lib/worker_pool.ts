/**
 * lib/worker_pool.ts - パスバッチの並列実行
 *
 * [0, num_simulations) を連続区間に分け、区間ごとに worker_threads を 1 本起動する。
 * Promise.all で全バッチを待ち、期限を過ぎたら全ワーカーを terminate して
 * ComputeTimeoutError で reject する（部分結果は返さない）。
 * workers: 0 は同一スレッドで実行し、パスの合間に期限を確認する。
 */

import { Worker } from 'node:worker_threads';
import { ComputeTimeoutError, SimulationError } from '../../../lib/error.js';
import { logger } from '../../../lib/logger.js';
import type { BatchResult, BatchSpec } from '../types.js';
import { parseWorkerMessage } from './batch_codec.js';
import { planBatches, simulateBatch } from './path_simulator.js';

export interface PathRunOptions {
  /** 0 で同一スレッド実行 */
  workers: number;
  timeoutMs: number;
}

export type BatchTemplate = Omit<BatchSpec, 'start' | 'end'>;

/**
 * ソース（.ts）から動いている場合は tsx を登録する JS の入口を経由する。
 * execArgv の --import はワーカースレッドにローダーを入れない。
 */
function resolveWorkerEntry(): URL {
  const self = import.meta.url;
  if (self.endsWith('.ts')) return new URL('./path_worker_bootstrap.mjs', self);
  return new URL('./path_worker.js', self);
}

function runWorker(entry: URL, spec: BatchSpec, registry: Worker[]): Promise<BatchResult> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(entry, { workerData: spec });
    registry.push(worker);
    let settled = false;

    worker.once('message', (raw: unknown) => {
      settled = true;
      try {
        const msg = parseWorkerMessage(raw);
        if (msg.ok) resolve(msg.result);
        else reject(new SimulationError(`batch [${spec.start}, ${spec.end}) failed: ${msg.name}: ${msg.error}`));
      } catch (e) {
        reject(e);
      }
    });
    worker.once('error', (err) => {
      settled = true;
      reject(err);
    });
    worker.once('exit', (code) => {
      if (!settled) {
        reject(new SimulationError(`batch [${spec.start}, ${spec.end}) worker exited with code ${code}`));
      }
    });
  });
}

async function runInProcess(template: BatchTemplate, n: number, timeoutMs: number): Promise<BatchResult[]> {
  const deadline = { at: Date.now() + timeoutMs, timeoutMs };
  return [simulateBatch({ ...template, start: 0, end: n }, deadline)];
}

async function runThreaded(template: BatchTemplate, n: number, opts: PathRunOptions): Promise<BatchResult[]> {
  const plan = planBatches(n, opts.workers);
  logger.debug('mc_batch_plan', { workers: plan.length, sizes: plan.map((b) => b.end - b.start) });

  const entry = resolveWorkerEntry();
  const workers: Worker[] = [];
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ComputeTimeoutError(opts.timeoutMs)), opts.timeoutMs);
  });

  try {
    const jobs = plan.map((range) => runWorker(entry, { ...template, ...range }, workers));
    return await Promise.race([Promise.all(jobs), timeout]);
  } finally {
    clearTimeout(timer);
    await Promise.all(workers.map((w) => w.terminate()));
  }
}

/**
 * バッチを実行し、パス番号順とは限らない BatchResult[] を返す
 */
export async function runPathBatches(
  template: BatchTemplate,
  n: number,
  opts: PathRunOptions
): Promise<BatchResult[]> {
  if (opts.workers <= 0) return runInProcess(template, n, opts.timeoutMs);
  return runThreaded(template, n, opts);
}
