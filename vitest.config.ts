import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			{
				test: {
					name: {
						label: 'uni',
						color: 'yellow',
					},
					include: ['packages/*/src/**/*.test.ts'],
					environment: 'node',
				},
			},
			{
				test: {
					name: {
						label: 'int',
						color: 'blue',
					},
					include: ['packages/*/tests/**/*.test.ts'],
					environment: 'node',
					testTimeout: 10000,
				},
			},
		],
		passWithNoTests: true,
		coverage: {
			exclude: [
				'**/coverage/**',
				'**/tests/**',
				'**/dist/**',
				'**/vitest.*',
				'**/*.test.ts',
			],
		},
	},
})
