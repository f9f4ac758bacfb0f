/**
 * Real resolution and scale factor of the primary monitor (ID 0).
 * width and height are physical pixels, scale is 1 when unscaled.
 */
export type DisplayInfo = {
	readonly width: number;
	readonly height: number;
	readonly scale: number;
};

/**
 * Integer coordinate pair. Whether it is in layout or physical space
 * depends on where it came from; see toPhysical.
 */
export type Point = {
	readonly x: number;
	readonly y: number;
};

/**
 * Base capability implemented by every display backend
 */
export type Display = {
	/**
	 * Cursor position in physical coordinates
	 */
	getCursorPosition(): Promise<Point>;

	/**
	 * Live resolution and scale of the primary monitor
	 */
	getScreenInfo(): Promise<DisplayInfo>;
};

/**
 * Optional capability for backends that keep the screen info around
 * to convert cursor positions without an extra round trip
 */
export type CachedScreenInfo = {
	/**
	 * Replace the stored screen info with a fresh fetch.
	 * The stored value is left untouched when the fetch fails.
	 */
	updateStoredScreenInfo(): Promise<void>;

	getStoredScreenInfo(): DisplayInfo;
};

/**
 * Type guard to check if a display also caches its screen info
 */
export function isCachedScreenInfo(display: unknown): display is CachedScreenInfo {
	return (
		typeof display === 'object'
		&& display !== null
		&& 'updateStoredScreenInfo' in display
		&& typeof display.updateStoredScreenInfo === 'function'
		&& 'getStoredScreenInfo' in display
		&& typeof display.getStoredScreenInfo === 'function'
	);
}

/**
 * Refresh the stored screen info if the display keeps one.
 * Currently only the Hyprland backend does.
 * @returns true when a refresh ran
 */
export async function maybeUpdateScreenInfo(display: Display): Promise<boolean> {
	if (!isCachedScreenInfo(display)) {
		return false;
	}

	await display.updateStoredScreenInfo();
	return true;
}
