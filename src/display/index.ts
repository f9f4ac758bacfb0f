export * from './display.interface.js';
export * from './errors.js';
export {parsePoint, toPhysical, roundHalfAwayFromZero} from './coordinates.js';
export {
	HyprlandDisplay,
	parseMonitors,
	selectPrimaryMonitor,
	type HyprlandDisplayOptions,
	type HyprlandMonitor,
} from './hyprland-display.js';
export {GenericDisplay} from './generic-display.js';
export {
	getDisplay,
	selectBackend,
	type DisplayBackend,
	type DisplayEnvironment,
	type GetDisplayOptions,
} from './factory.js';
export {
	sendCommand,
	HyprlandCommand,
	responseBudget,
	type CommandTransport,
} from '../ipc/hyprland-socket.js';
export {
	resolveHyprlandConfig,
	getHyprlandSocketPath,
	type HyprlandConfig,
} from '../utils/config.js';
