import type { z } from 'zod';

/**
 * MCP ツール定義。各ツールファイル（または src/handlers/）で `toolDef` として export する。
 * server は tool-registry.ts 経由でこの定義を自動収集し registerToolWithLog に渡す。
 *
 * ツール追加/改修時は toolDef を更新するだけで server 側の変更は不要。
 */
export interface ToolDefinition {
	/** MCP ツール名 (e.g. 'run_monte_carlo') */
	name: string;
	/** ツール説明（LLM 向け） */
	description: string;
	/** SDK に渡す Zod raw shape */
	inputShape: z.ZodRawShape;
	/** 入力を自前のスキーマで parse してから実ハンドラに渡す。respond() で自動ラップされる。 */
	handler: (args: unknown) => Promise<unknown>;
}

/**
 * 入力スキーマとハンドラの型をつないだまま ToolDefinition を作る。
 * handler には parse 済み（デフォルト適用済み）の値が渡る。
 */
export function defineTool<S extends z.ZodRawShape>(def: {
	name: string;
	description: string;
	inputSchema: z.ZodObject<S>;
	handler: (args: z.output<z.ZodObject<S>>) => Promise<unknown>;
}): ToolDefinition {
	return {
		name: def.name,
		description: def.description,
		inputShape: def.inputSchema.shape,
		handler: async (args) => def.handler(def.inputSchema.parse(args)),
	};
}
