import type {Display, DisplayInfo, Point} from './display.interface.js';

/**
 * nut.js loads native bindings on import, so it is only pulled in once a
 * generic display is actually queried
 */
async function loadNutJs(): Promise<typeof import('@nut-tree-fork/nut-js')> {
	return import('@nut-tree-fork/nut-js');
}

/**
 * Display backend for Windows, macOS and X11 Linux (not Wayland), using nut.js.
 * nut.js already reports physical pixels, so the scale is always 1.
 */
export class GenericDisplay implements Display {
	async getScreenInfo(): Promise<DisplayInfo> {
		const {screen} = await loadNutJs();
		const [width, height] = await Promise.all([screen.width(), screen.height()]);
		return Object.freeze({width, height, scale: 1});
	}

	async getCursorPosition(): Promise<Point> {
		const {mouse} = await loadNutJs();
		const position = await mouse.getPosition();
		return {x: Math.round(position.x), y: Math.round(position.y)};
	}
}
