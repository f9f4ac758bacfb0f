import type {DisplayInfo, Point} from './display.interface.js';
import {FormatError} from './errors.js';

const integerPattern = /^[+-]?\d+$/;

function parseInteger(text: string, source: string): number {
	const trimmed = text.trim();
	if (!integerPattern.test(trimmed)) {
		throw new FormatError(`Invalid coordinate "${trimmed}" in position "${source.trim()}"`);
	}

	const value = Number.parseInt(trimmed, 10);
	if (!Number.isSafeInteger(value)) {
		throw new FormatError(`Coordinate "${trimmed}" is out of range in position "${source.trim()}"`);
	}

	return value;
}

/**
 * Parse a position of the form "<x>, <y>"
 * @throws FormatError if the text is not two comma-separated integers
 */
export function parsePoint(text: string): Point {
	const comma = text.indexOf(',');
	if (comma === -1) {
		throw new FormatError(`Expected "<x>, <y>" but got "${text.trim()}"`);
	}

	return {
		x: parseInteger(text.slice(0, comma), text),
		y: parseInteger(text.slice(comma + 1), text),
	};
}

/**
 * Round to the nearest integer, ties away from zero (4.5 -> 5, -4.5 -> -5)
 */
export function roundHalfAwayFromZero(value: number): number {
	const rounded = Math.round(Math.abs(value));
	return value < 0 && rounded > 0 ? -rounded : rounded;
}

/**
 * Convert global layout coordinates to physical coordinates.
 *
 * Layout coordinates have the monitor's scale and transform applied, so a
 * 3200x1800 monitor at 2x scale takes up a 1600x900 rectangle. Only the scale
 * is undone here: a monitor rotated by 90 degrees would also need its axes
 * swapped, which is not handled.
 */
export function toPhysical(point: Point, info: DisplayInfo): Point {
	return {
		x: roundHalfAwayFromZero(point.x * info.scale),
		y: roundHalfAwayFromZero(point.y * info.scale),
	};
}
