import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Request, Response } from 'express';
import { configureLogger, logError, logger } from '../lib/logger.js';
import { getConfig, type AppConfig } from './config.js';
import { createMcpServer, SERVER_INFO } from './mcp-server.js';

const config = getConfig();
configureLogger(config);

/**
 * HTTP (/mcp)。ステートレス運用: リクエストごとに McpServer + トランスポートを作って閉じる。
 * stdout は使わない（stdio と同居する場合の混線防止）。
 */
async function startHttp(http: AppConfig['http'], port: number): Promise<void> {
	const { default: express } = await import('express');
	const app = express();
	app.use(express.json());
	// Host ヘッダはポート付きで届くので、ポート無しの指定には :port 版も足す
	const allowedHosts = http.allowedHosts.flatMap((h) => (h.includes(':') ? [h] : [h, `${h}:${port}`]));

	app.post('/mcp', async (req, res) => {
		const server = createMcpServer();
		const transport = new StreamableHTTPServerTransport({
			sessionIdGenerator: undefined,
			enableDnsRebindingProtection: true,
			allowedHosts,
			...(http.allowedOrigins.length ? { allowedOrigins: http.allowedOrigins } : {}),
		});
		res.on('close', () => {
			Promise.all([transport.close(), server.close()]).catch((err: unknown) => logError('http_close', err));
		});
		try {
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
		} catch (err: unknown) {
			logError('http_request', err);
			if (!res.headersSent) {
				res.status(500).json({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null });
			}
		}
	});

	// ステートレスなので SSE ストリームとセッション削除は受け付けない
	const methodNotAllowed = (_req: Request, res: Response) => {
		res.status(405).json({ jsonrpc: '2.0', error: { code: -32000, message: 'Method not allowed.' }, id: null });
	};
	app.get('/mcp', methodNotAllowed);
	app.delete('/mcp', methodNotAllowed);

	await new Promise<void>((resolve) => {
		app.listen(port, () => resolve());
	});
	logger.info('http_listening', { port, path: '/mcp' });
}

if (config.http.enabled && config.http.port != null) {
	await startHttp(config.http, config.http.port);
} else {
	const server = createMcpServer();
	await server.connect(new StdioServerTransport());
	logger.info('stdio_connected', { server: SERVER_INFO.name, version: SERVER_INFO.version, workers: config.workers });
}
