/**
 * lib/batch_codec.ts - ワーカー境界でのメッセージ検証
 *
 * workerData / postMessage の値は型が付かないので、受け取った側で zod に通す。
 */

import { z } from 'zod';
import type { BatchResult, BatchSpec } from '../types.js';
import { SeedSchema, SimulationParametersShape } from './parameters.js';

const index = z.number().int().nonnegative();

export const BatchSpecSchema = z.object({
  params: SimulationParametersShape,
  seed: SeedSchema,
  start: index,
  end: index,
  checkpoints: z.array(index),
  sampleIndices: z.array(index),
});

const PathStatsSchema = z.object({
  final_equity: z.number(),
  max_drawdown: z.number(),
  wins: z.number(),
  trades: z.number(),
  gross_profit: z.number(),
  gross_loss: z.number(),
  profit_trades: z.number(),
  loss_trades: z.number(),
  largest_win: z.number(),
  largest_loss: z.number(),
  ret_count: z.number(),
  ret_mean: z.number(),
  ret_m2: z.number(),
});

export const BatchResultSchema = z.object({
  start: index,
  end: index,
  stats: z.array(PathStatsSchema),
  checkpointEquity: z.instanceof(Float64Array),
  samples: z.array(z.object({ index, equity: z.array(z.number()) })),
});

/** ワーカー → 親のメッセージ */
export const WorkerMessageSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: BatchResultSchema }),
  z.object({ ok: z.literal(false), name: z.string(), error: z.string() }),
]);

export type WorkerMessage = { ok: true; result: BatchResult } | { ok: false; name: string; error: string };

export function parseBatchSpec(data: unknown): BatchSpec {
  return BatchSpecSchema.parse(data);
}

export function parseWorkerMessage(data: unknown): WorkerMessage {
  return WorkerMessageSchema.parse(data);
}
