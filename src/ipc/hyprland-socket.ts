import {createConnection, type Socket} from 'node:net';
import {once} from 'node:events';
import {ConnectionError, IoError} from '../display/errors.js';
import {logger} from '../utils/logger.js';

/**
 * Commands understood by Hyprland's control socket.
 * The "j" flag selects JSON output, like `hyprctl -j`.
 */
export const HyprlandCommand = {
	cursorPosition: '/cursorpos',
	monitors: 'j/monitors',
} as const;

export type HyprlandCommand = typeof HyprlandCommand[keyof typeof HyprlandCommand];

/**
 * Largest response read for each command. Anything past it is dropped.
 */
export const responseBudget: Record<HyprlandCommand, number> = {
	[HyprlandCommand.cursorPosition]: 512,
	[HyprlandCommand.monitors]: 4096,
};

/**
 * Signature of sendCommand, so backends can be handed another transport
 */
export type CommandTransport = (socketPath: string, command: string, maxResponseBytes: number) => Promise<string>;

function writeCommand(socket: Socket, command: string): Promise<void> {
	return new Promise((resolve, reject) => {
		socket.write(command, 'utf8', (error) => {
			if (error) {
				reject(error);
			} else {
				resolve();
			}
		});
	});
}

/**
 * Resolve with the first chunk the peer sends, or an empty buffer if it
 * closes without sending anything. Does not wait for the end of the stream.
 */
function readOnce(socket: Socket): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const cleanup = () => {
			socket.off('data', onData);
			socket.off('end', onEnd);
			socket.off('error', onError);
		};

		const onData = (chunk: Buffer) => {
			cleanup();
			socket.pause();
			resolve(chunk);
		};

		const onEnd = () => {
			cleanup();
			resolve(Buffer.alloc(0));
		};

		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};

		socket.on('data', onData);
		socket.on('end', onEnd);
		socket.on('error', onError);
	});
}

/**
 * Send one command over a fresh connection and return the response.
 *
 * Only a single read of at most maxResponseBytes is made; a longer response
 * is truncated rather than waited for. The socket is destroyed on every path.
 *
 * @throws ConnectionError if the socket cannot be reached
 * @throws IoError if writing or reading fails
 */
export async function sendCommand(socketPath: string, command: string, maxResponseBytes: number): Promise<string> {
	const socket = createConnection({path: socketPath});

	// Failures are reported through whichever step is pending; this listener
	// only keeps a late error from becoming an uncaught exception.
	socket.on('error', (error: Error) => {
		logger.debug(`Hyprland socket error during ${command}:`, error);
	});

	try {
		try {
			await once(socket, 'connect');
		} catch (error) {
			throw new ConnectionError(`Could not connect to Hyprland socket at ${socketPath}`, {cause: error});
		}

		let response: Buffer;
		try {
			await writeCommand(socket, command);
			response = await readOnce(socket);
		} catch (error) {
			throw new IoError(`Hyprland socket exchange failed for ${command}`, {cause: error});
		}

		logger.debug(`Hyprland ${command}: received ${response.length} bytes`);
		return response.subarray(0, maxResponseBytes).toString('utf8');
	} finally {
		socket.destroy();
	}
}
