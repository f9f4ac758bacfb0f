import {tmpdir} from 'node:os';
import {join} from 'node:path';
import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts'],
		env: {
			DISPLAY_INTERFACE_LOG_DIR: join(tmpdir(), 'display-interface-test-logs'),
		},
	},
});
