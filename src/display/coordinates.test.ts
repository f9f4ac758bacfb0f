import {describe, it, expect} from 'vitest';
import {parsePoint, roundHalfAwayFromZero, toPhysical} from './coordinates.js';
import {FormatError} from './errors.js';

describe('Coordinate conversion', () => {
	describe('parsePoint', () => {
		it('should parse a Hyprland cursor position', () => {
			expect(parsePoint('12, 34')).toEqual({x: 12, y: 34});
		});

		it('should tolerate whitespace around the comma', () => {
			expect(parsePoint('  -5 ,7')).toEqual({x: -5, y: 7});
		});

		it('should tolerate a trailing newline', () => {
			expect(parsePoint('1920, 1080\n')).toEqual({x: 1920, y: 1080});
		});

		it('should throw FormatError without a comma', () => {
			expect(() => parsePoint('12')).toThrow(FormatError);
			expect(() => parsePoint('12')).toThrow('Expected "<x>, <y>" but got "12"');
		});

		it('should throw FormatError for non-integer coordinates', () => {
			expect(() => parsePoint('a,b')).toThrow(FormatError);
			expect(() => parsePoint('1.5, 2')).toThrow('Invalid coordinate "1.5" in position "1.5, 2"');
		});

		it('should throw FormatError for an empty side', () => {
			expect(() => parsePoint('12,')).toThrow(FormatError);
			expect(() => parsePoint(', 4')).toThrow(FormatError);
		});

		it('should throw FormatError for coordinates beyond the safe integer range', () => {
			expect(() => parsePoint('99999999999999999999, 1')).toThrow(
				'Coordinate "99999999999999999999" is out of range in position "99999999999999999999, 1"',
			);
			expect(() => parsePoint(`1, ${'9'.repeat(400)}`)).toThrow(FormatError);
		});

		it('should only split on the first comma', () => {
			expect(() => parsePoint('1, 2, 3')).toThrow('Invalid coordinate "2, 3"');
		});
	});

	describe('toPhysical', () => {
		it('should leave coordinates unchanged at scale 1', () => {
			expect(toPhysical({x: 100, y: 100}, {width: 1920, height: 1080, scale: 1})).toEqual({x: 100, y: 100});
		});

		it('should multiply coordinates by the scale', () => {
			expect(toPhysical({x: 100, y: 100}, {width: 3200, height: 1800, scale: 2})).toEqual({x: 200, y: 200});
		});

		it('should round fractional results half away from zero', () => {
			expect(toPhysical({x: 3, y: 3}, {width: 2880, height: 1620, scale: 1.5})).toEqual({x: 5, y: 5});
			expect(toPhysical({x: -3, y: 1}, {width: 2880, height: 1620, scale: 1.5})).toEqual({x: -5, y: 2});
		});

		it('should scale each axis independently', () => {
			expect(toPhysical({x: 10, y: 7}, {width: 2400, height: 1500, scale: 1.25})).toEqual({x: 13, y: 9});
		});
	});

	describe('roundHalfAwayFromZero', () => {
		it('should round ties away from zero', () => {
			expect(roundHalfAwayFromZero(4.5)).toBe(5);
			expect(roundHalfAwayFromZero(-4.5)).toBe(-5);
			expect(roundHalfAwayFromZero(2.4)).toBe(2);
		});

		it('should not produce negative zero', () => {
			expect(Object.is(roundHalfAwayFromZero(-0.25), 0)).toBe(true);
		});
	});
});
