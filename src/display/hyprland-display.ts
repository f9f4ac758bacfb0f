import {
	HyprlandCommand,
	responseBudget,
	sendCommand,
	type CommandTransport,
} from '../ipc/hyprland-socket.js';
import {getHyprlandSocketPath, type HyprlandConfig} from '../utils/config.js';
import {logger} from '../utils/logger.js';
import {parsePoint, toPhysical} from './coordinates.js';
import type {
	CachedScreenInfo,
	Display,
	DisplayInfo,
	Point,
} from './display.interface.js';
import {AmbiguousError, FormatError, NotFoundError} from './errors.js';

/**
 * Fields read from one entry of `hyprctl monitors -j`.
 * The compositor sends many more; they are ignored.
 */
export type HyprlandMonitor = {
	id: number;
	width: number;
	height: number;
	scale: number;
};

export type HyprlandDisplayOptions = {
	/** Replaces the Unix socket exchange, e.g. with a fake in tests */
	transport?: CommandTransport;
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveNumber(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isPositiveInteger(value: unknown): value is number {
	return isPositiveNumber(value) && Number.isInteger(value);
}

/**
 * Parse the monitor list and keep only entries that are objects.
 * @throws FormatError if the text is not a JSON array
 */
export function parseMonitors(json: string): Array<Record<string, unknown>> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (error) {
		throw new FormatError('Hyprland monitor list is not valid JSON', {cause: error});
	}

	if (!Array.isArray(parsed)) {
		throw new FormatError('Hyprland monitor list is not a JSON array');
	}

	return parsed.filter((entry) => isRecord(entry));
}

/**
 * Pick the monitor with ID 0. Multi-monitor layouts are not resolved;
 * exactly one entry must match.
 */
export function selectPrimaryMonitor(monitors: Array<Record<string, unknown>>): HyprlandMonitor {
	const matches = monitors.filter((monitor) => monitor.id === 0);

	if (matches.length === 0) {
		throw new NotFoundError('Could not find any monitor with ID = 0');
	}

	if (matches.length > 1) {
		throw new AmbiguousError(`Expected exactly one monitor with ID = 0, but found ${matches.length}`);
	}

	const monitor: Record<string, unknown> = matches[0] ?? {};
	const {width, height, scale} = monitor;
	if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveNumber(scale)) {
		throw new FormatError(`Monitor 0 has invalid geometry: ${JSON.stringify({width, height, scale})}`);
	}

	return {id: 0, width, height, scale};
}

async function fetchScreenInfo(socketPath: string, transport: CommandTransport): Promise<DisplayInfo> {
	const command = HyprlandCommand.monitors;
	const response = await transport(socketPath, command, responseBudget[command]);
	const {width, height, scale} = selectPrimaryMonitor(parseMonitors(response));
	return Object.freeze({width, height, scale});
}

/**
 * Display backend for Hyprland, talking to its control socket.
 *
 * Cursor positions are converted with the screen info stored at creation,
 * so a query costs one round trip. Call updateStoredScreenInfo after the
 * monitor configuration changes.
 */
export class HyprlandDisplay implements Display, CachedScreenInfo {
	/**
	 * Connect to Hyprland and store the current screen info
	 * @throws whatever getScreenInfo throws; no instance is created then
	 */
	static async create(config: HyprlandConfig, options: HyprlandDisplayOptions = {}): Promise<HyprlandDisplay> {
		const socketPath = getHyprlandSocketPath(config);
		const transport = options.transport ?? sendCommand;
		const screenInfo = await fetchScreenInfo(socketPath, transport);
		logger.info(`Hyprland display ready at ${socketPath}:`, screenInfo);
		return new HyprlandDisplay(socketPath, transport, screenInfo);
	}

	private refreshGeneration = 0;

	private constructor(
		readonly socketPath: string,
		private readonly transport: CommandTransport,
		private screenInfo: DisplayInfo,
	) {}

	async getScreenInfo(): Promise<DisplayInfo> {
		return fetchScreenInfo(this.socketPath, this.transport);
	}

	async getCursorPosition(): Promise<Point> {
		const command = HyprlandCommand.cursorPosition;
		const response = await this.transport(this.socketPath, command, responseBudget[command]);
		return toPhysical(parsePoint(response), this.screenInfo);
	}

	/**
	 * When refreshes overlap, only the most recently started one is stored,
	 * so a slow older fetch never overwrites a newer result.
	 */
	async updateStoredScreenInfo(): Promise<void> {
		const generation = ++this.refreshGeneration;
		const screenInfo = await this.getScreenInfo();
		if (generation !== this.refreshGeneration) {
			logger.debug('Discarding screen info from a superseded refresh:', screenInfo);
			return;
		}

		this.screenInfo = screenInfo;
		logger.debug('Hyprland screen info updated:', screenInfo);
	}

	getStoredScreenInfo(): DisplayInfo {
		return this.screenInfo;
	}
}
