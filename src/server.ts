import {Server} from '@modelcontextprotocol/sdk/server/index.js';
import {
	CallToolRequestSchema,
	ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type {Display} from './display/display.interface.js';
import {DisplayIO} from './io/system/display-io.js';

/**
 * Create an MCP server exposing the display's tools
 */
export function createDisplayServer(display: Display): Server {
	const displayIO = new DisplayIO(display);
	const tools = displayIO.getTools();

	const server = new Server({
		name: 'display-interface',
		version: '1.0.0',
	}, {
		capabilities: {
			tools: {},
		},
	});

	server.setRequestHandler(ListToolsRequestSchema, async () => {
		return {tools};
	});

	// Tool names follow the pattern {ioclass}_{action}
	server.setRequestHandler(CallToolRequestSchema, async (request) => {
		const {name, arguments: toolArgs} = request.params;

		if (!tools.some((tool) => tool.name === name)) {
			throw new Error(`Unknown tool: ${name}`);
		}

		return displayIO.handleAction(name, toolArgs ?? {});
	});

	return server;
}
