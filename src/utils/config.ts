import {join} from 'node:path';
import {homedir} from 'node:os';

/**
 * Values needed to reach a Hyprland instance's control socket
 */
export type HyprlandConfig = {
	runtimeDir: string;
	instanceSignature: string;
};

/**
 * Build the Hyprland config from environment variables.
 * Unset variables become empty strings, which yields a socket path that
 * does not exist and a ConnectionError on first use.
 */
export function resolveHyprlandConfig(env: NodeJS.ProcessEnv = process.env): HyprlandConfig {
	return {
		runtimeDir: env.XDG_RUNTIME_DIR ?? '',
		instanceSignature: env.HYPRLAND_INSTANCE_SIGNATURE ?? '',
	};
}

/**
 * Path of the request/response control socket (not the .socket2 event socket)
 */
export function getHyprlandSocketPath(config: HyprlandConfig): string {
	return `${config.runtimeDir}/hypr/${config.instanceSignature}/.socket.sock`;
}

/**
 * Get the log directory
 * Override with the DISPLAY_INTERFACE_LOG_DIR environment variable
 */
export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
	const override = env.DISPLAY_INTERFACE_LOG_DIR;
	if (override) {
		return override;
	}

	return join(homedir(), '.mcp', 'display-interface');
}
