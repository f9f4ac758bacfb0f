import {describe, it, expect} from 'vitest';
import {Client} from '@modelcontextprotocol/sdk/client/index.js';
import {InMemoryTransport} from '@modelcontextprotocol/sdk/inMemory.js';
import type {Display} from './display/display.interface.js';
import {createDisplayServer} from './server.js';

const display: Display = {
	getCursorPosition: async () => ({x: 1600, y: 900}),
	getScreenInfo: async () => ({width: 3200, height: 1800, scale: 2}),
};

async function connectClient(): Promise<Client> {
	const server = createDisplayServer(display);
	const client = new Client({name: 'test-client', version: '1.0.0'});
	const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
	await Promise.all([
		server.connect(serverTransport),
		client.connect(clientTransport),
	]);
	return client;
}

describe('Display MCP server', () => {
	it('should list the display tools', async () => {
		const client = await connectClient();

		const {tools} = await client.listTools();

		expect(tools.map((tool) => tool.name)).toEqual([
			'display_cursor_position',
			'display_screen_info',
			'display_refresh_screen_info',
		]);
		await client.close();
	});

	it('should route tool calls to the display', async () => {
		const client = await connectClient();

		const result = await client.callTool({name: 'display_cursor_position', arguments: {}});

		expect(result.content).toEqual([{
			type: 'text',
			text: '{"action":"display_cursor_position","x":1600,"y":900}',
		}]);
		await client.close();
	});

	it('should reject unknown tools', async () => {
		const client = await connectClient();

		await expect(client.callTool({name: 'mouse_click', arguments: {}})).rejects.toThrow('Unknown tool: mouse_click');
		await client.close();
	});
});
