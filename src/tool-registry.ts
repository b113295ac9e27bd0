/**
 * tool-registry.ts — 全 MCP ツール定義の集約
 *
 * 各ツールファイル（tools/*.ts）または複雑なハンドラファイル（src/handlers/*Handler.ts）から
 * toolDef をインポートし、配列として server に提供する。
 *
 * 【ツール追加手順】
 * 1. tools/<name>.ts にツール関数を実装
 * 2. 同ファイル（または src/handlers/<name>Handler.ts）に defineTool で toolDef を export
 * 3. ★ 本ファイルに import + allToolDefs に追加 ★
 */

import type { ToolDefinition } from './tool-definition.js';

// ── Simple tools（toolDef はツールファイル内） ──
import { toolDef as getMonteCarloExample } from '../tools/get_monte_carlo_example.js';
import { toolDef as estimateTradeEdge } from '../tools/estimate_trade_edge.js';

// ── Complex tools（toolDef + handler は src/handlers/ に分離） ──
import { toolDef as runMonteCarlo } from './handlers/runMonteCarloHandler.js';

export const allToolDefs: ToolDefinition[] = [
	// Simulation
	runMonteCarlo,
	getMonteCarloExample,

	// Sizing
	estimateTradeEdge,
];
