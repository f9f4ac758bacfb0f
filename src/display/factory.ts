import {resolveHyprlandConfig} from '../utils/config.js';
import {logger} from '../utils/logger.js';
import type {Display} from './display.interface.js';
import {UnsupportedError} from './errors.js';
import {GenericDisplay} from './generic-display.js';
import {HyprlandDisplay, type HyprlandDisplayOptions} from './hyprland-display.js';

export type DisplayBackend = 'generic' | 'hyprland';

/**
 * What backend selection looks at
 */
export type DisplayEnvironment = {
	platform: NodeJS.Platform;
	env: NodeJS.ProcessEnv;
};

export type GetDisplayOptions = Partial<DisplayEnvironment> & HyprlandDisplayOptions;

/**
 * Decide which backend serves this platform and session
 * @throws UnsupportedError if none does
 */
export function selectBackend({platform, env}: DisplayEnvironment): DisplayBackend {
	switch (platform) {
		case 'linux': {
			const sessionType = env.XDG_SESSION_TYPE ?? '';
			if (sessionType === 'x11') {
				return 'generic';
			}

			if (sessionType === 'wayland') {
				if (env.HYPRLAND_INSTANCE_SIGNATURE) {
					return 'hyprland';
				}

				throw new UnsupportedError('Non-Hyprland Wayland compositors are not supported');
			}

			throw new UnsupportedError(`Unrecognised Linux session type: "${sessionType}"`);
		}

		case 'win32':
		case 'darwin': {
			return 'generic';
		}

		default: {
			throw new UnsupportedError(`Platform ${platform} is not supported`);
		}
	}
}

/**
 * Detect the current environment and create a display for it
 */
export async function getDisplay(options: GetDisplayOptions = {}): Promise<Display> {
	const {platform = process.platform, env = process.env, ...hyprlandOptions} = options;
	const backend = selectBackend({platform, env});
	logger.info(`Selected ${backend} display backend for ${platform}`);

	if (backend === 'hyprland') {
		return HyprlandDisplay.create(resolveHyprlandConfig(env), hyprlandOptions);
	}

	return new GenericDisplay();
}
