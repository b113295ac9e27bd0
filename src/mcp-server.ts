import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { getErrorMessage } from '../lib/error.js';
import { logError, logToolRun } from '../lib/logger.js';
import type { ToolDefinition } from './tool-definition.js';
import { allToolDefs } from './tool-registry.js';

export const SERVER_INFO = { name: 'risk-sim-mcp', version: '0.1.0' } as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ツール結果 → MCP の CallToolResult
 * テキストは summary を優先し、無ければ短縮 JSON にフォールバックする。
 */
export function respond(result: unknown): CallToolResult {
	let text = '';
	if (isPlainObject(result) && typeof result.summary === 'string') {
		text = result.summary;
	}
	if (!text) {
		try {
			const json =
				JSON.stringify(
					result,
					(_key, value: unknown) => {
						if (typeof value === 'string' && value.length > 2000) return `…omitted (${value.length} chars)`;
						return value;
					},
					2
				) ?? String(result);
			text = json.length > 4000 ? json.slice(0, 4000) + '\n…(truncated)…' : json;
		} catch (e) {
			text = `[unserializable result: ${getErrorMessage(e)}]`;
		}
	}
	return {
		content: [{ type: 'text', text }],
		...(isPlainObject(result) ? { structuredContent: result } : {}),
	};
}

function registerToolWithLog(server: McpServer, def: ToolDefinition): void {
	server.registerTool(
		def.name,
		{ description: def.description, inputSchema: def.inputShape },
		async (input): Promise<CallToolResult> => {
			const t0 = Date.now();
			try {
				const result = await def.handler(input);
				logToolRun({ tool: def.name, input, result, ms: Date.now() - t0 });
				return respond(result);
			} catch (err: unknown) {
				const ms = Date.now() - t0;
				logError(def.name, err, input);
				const message = getErrorMessage(err) || 'unknown error';
				return {
					content: [{ type: 'text', text: `internal error: ${message}` }],
					structuredContent: {
						ok: false,
						summary: `internal error: ${message}`,
						data: {},
						meta: { ms, errorType: 'internal' },
					},
					isError: true,
				};
			}
		}
	);
}

/** 全ツールを登録した McpServer を作る（トランスポートごとに 1 インスタンス） */
export function createMcpServer(defs: ToolDefinition[] = allToolDefs): McpServer {
	const server = new McpServer(SERVER_INFO);
	for (const def of defs) registerToolWithLog(server, def);
	return server;
}
