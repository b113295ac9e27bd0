/**
 * lib/path_worker.ts - worker_threads のエントリポイント
 *
 * workerData の BatchSpec を 1 バッチ分走らせて親に返す。
 * 期限管理は親側（terminate）で行う。
 */

import { parentPort, workerData } from 'node:worker_threads';
import { getErrorMessage } from '../../../lib/error.js';
import { parseBatchSpec, type WorkerMessage } from './batch_codec.js';
import { simulateBatch } from './path_simulator.js';

if (!parentPort) throw new Error('path_worker must be started as a worker thread');
const port = parentPort;

try {
  const result = simulateBatch(parseBatchSpec(workerData));
  const message: WorkerMessage = { ok: true, result };
  port.postMessage(message);
} catch (e) {
  const message: WorkerMessage = {
    ok: false,
    name: e instanceof Error ? e.name : 'Error',
    error: getErrorMessage(e),
  };
  port.postMessage(message);
}
