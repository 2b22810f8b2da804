import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		coverage: {
			include: ['src/**/*.ts'],
			exclude: ['src/**/index.ts', 'src/testing/**/*.ts'],
			reporter: ['text', 'lcov'],
			thresholds: {
				lines: 90,
				functions: 90,
				branches: 85,
				statements: 90,
			},
		},
	},
})
