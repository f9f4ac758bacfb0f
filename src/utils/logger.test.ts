import {describe, it, expect} from 'vitest';
import {mkdtemp, readFile, rm} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import {join} from 'node:path';
import {Logger} from './logger.js';

describe('Logger', () => {
	it('should append formatted lines to server.log', async () => {
		const directory = await mkdtemp(join(tmpdir(), 'display-log-'));
		try {
			const logger = new Logger(directory);
			logger.info('Selected hyprland display backend for linux');
			logger.debug('Hyprland screen info updated:', {width: 1920, height: 1080, scale: 1});

			const lines = (await readFile(logger.getLogPath(), 'utf8')).trimEnd().split('\n');

			expect(logger.getLogPath()).toBe(join(directory, 'server.log'));
			expect(lines).toHaveLength(2);
			expect(lines[0]).toMatch(/^\[.+\] \[INFO\] Selected hyprland display backend for linux$/);
			expect(lines[1]).toMatch(/\[DEBUG\] Hyprland screen info updated: \{"width":1920,"height":1080,"scale":1\}$/);
		} finally {
			await rm(directory, {recursive: true, force: true});
		}
	});

	it('should include the error name and message', () => {
		const logger = new Logger(tmpdir());
		const line = logger.formatMessage('ERROR', 'Startup failed:', new TypeError('bad value'));

		expect(line).toContain('[ERROR] Startup failed: TypeError: bad value\n');
	});
});
