#!/usr/bin/env node
import {StdioServerTransport} from '@modelcontextprotocol/sdk/server/stdio.js';
import {getDisplay} from './display/factory.js';
import {createDisplayServer} from './server.js';
import {logger} from './utils/logger.js';

async function main(): Promise<void> {
	const display = await getDisplay();
	const server = createDisplayServer(display);

	const shutdown = () => {
		server.close().then(() => {
			process.exit(0);
		}, (error: unknown) => {
			logger.error('Server shutdown failed:', error);
			process.exit(1);
		});
	};

	process.on('SIGINT', shutdown);
	process.on('SIGTERM', shutdown);

	await server.connect(new StdioServerTransport());
	logger.info('Display interface MCP server running on stdio');
}

main().catch((error: unknown) => {
	logger.error('Server startup failed:', error);
	process.exit(1);
});
