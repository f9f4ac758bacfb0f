import type {ToolResponse} from '../core/io-class.interface.js';

/**
 * Turn a failed display query into an MCP error response.
 *
 * The error name carries the failure kind (ConnectionError, FormatError,
 * NotFoundError, ...). When a display error wraps a lower-level one, such as
 * the socket error behind an IoError, its message is reported as `cause`.
 */
export function createErrorResponse(error: unknown, context?: string): ToolResponse {
	const details = error instanceof Error
		? {
			name: error.name,
			message: error.message,
			cause: error.cause instanceof Error ? error.cause.message : undefined,
			stack: error.stack,
		}
		: {name: 'Error', message: String(error)};

	return {
		content: [
			{
				type: 'text',
				text: JSON.stringify({success: false, error: {...details, context}}, null, 2),
			},
		],
		isError: true,
	};
}
