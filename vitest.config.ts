/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		setupFiles: ['./tests/unit/setup.ts'],
		include: ['tests/unit/**/*.test.ts'],
		exclude: ['node_modules', 'dist'],
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json', 'html'],
			include: ['src/**/*.ts'],
			exclude: ['src/engine/types/**', '**/*.d.ts', '**/*.test.*']
		},
		testTimeout: 10000,
		hookTimeout: 10000
	},
	resolve: {
		alias: {
			$engine: fromRoot('./src/engine')
		}
	}
});
