import type {Tool} from '@modelcontextprotocol/sdk/types.js';
import type {IOClass, ToolResponse} from '../../core/io-class.interface.js';
import {
	isCachedScreenInfo,
	maybeUpdateScreenInfo,
	type Display,
} from '../../display/display.interface.js';
import {createErrorResponse} from '../../utils/error-response.js';
import {logger} from '../../utils/logger.js';

const emptySchema: Tool['inputSchema'] = {
	type: 'object',
	properties: {},
};

function textResponse(payload: Record<string, unknown>): ToolResponse {
	return {
		content: [{
			type: 'text',
			text: JSON.stringify(payload),
		}],
	};
}

/**
 * DisplayIO exposes cursor position and screen geometry of a Display
 */
export class DisplayIO implements IOClass {
	constructor(private readonly display: Display) {}

	get category(): 'system' {
		return 'system';
	}

	get name(): string {
		return 'display';
	}

	get description(): string {
		return 'Read the cursor position and primary screen geometry in physical pixels';
	}

	getTools(): Tool[] {
		return [
			{
				name: 'display_cursor_position',
				description: 'Get the current (x, y) cursor position in physical pixels',
				inputSchema: emptySchema,
			},
			{
				name: 'display_screen_info',
				description: 'Get the width, height and scale factor of the primary monitor (ID 0)',
				inputSchema: emptySchema,
			},
			{
				name: 'display_refresh_screen_info',
				description: 'Re-read the stored screen info used to convert cursor positions. Only some backends store it; others report refreshed: false',
				inputSchema: emptySchema,
			},
		];
	}

	async handleAction(action: string, _params: Record<string, unknown>): Promise<ToolResponse> {
		try {
			switch (action) {
				case 'display_cursor_position': {
					return await this.handleCursorPosition();
				}

				case 'display_screen_info': {
					return await this.handleScreenInfo();
				}

				case 'display_refresh_screen_info': {
					return await this.handleRefresh();
				}

				default: {
					throw new Error(`Unknown display action: ${action}`);
				}
			}
		} catch (error) {
			logger.error(`DisplayIO.${action} failed:`, error);
			return createErrorResponse(error, `DisplayIO.${action}`);
		}
	}

	private async handleCursorPosition(): Promise<ToolResponse> {
		const {x, y} = await this.display.getCursorPosition();
		return textResponse({action: 'display_cursor_position', x, y});
	}

	private async handleScreenInfo(): Promise<ToolResponse> {
		const {width, height, scale} = await this.display.getScreenInfo();
		return textResponse({
			action: 'display_screen_info',
			width,
			height,
			scale,
		});
	}

	private async handleRefresh(): Promise<ToolResponse> {
		const refreshed = await maybeUpdateScreenInfo(this.display);
		return textResponse({
			action: 'display_refresh_screen_info',
			refreshed,
			screenInfo: isCachedScreenInfo(this.display) ? this.display.getStoredScreenInfo() : undefined,
		});
	}
}
