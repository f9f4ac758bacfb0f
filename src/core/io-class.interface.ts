import type {Tool} from '@modelcontextprotocol/sdk/types.js';

/**
 * Response format for tool execution
 */
export type ToolResponse = {
	content: Array<{
		type: 'text';
		text: string;
	}>;
	/** Flag indicating this is an error response */
	isError?: boolean;
};

/**
 * Base interface for all IO classes
 */
export type IOClass = {
	/** Category: input, vision, or system */
	readonly category: 'input' | 'vision' | 'system';

	/** IO class name (e.g., 'display') */
	readonly name: string;

	/** Description of the IO class capabilities */
	readonly description: string;

	/**
	 * Get all tools provided by this IO class
	 * Tool names are prefixed with the IO class name
	 */
	getTools(): Tool[];

	/**
	 * Handle execution of an action
	 * @param action - The action name (e.g., 'display_screen_info')
	 * @param params - Action parameters
	 */
	handleAction(action: string, params: Record<string, unknown>): Promise<ToolResponse>;
};
