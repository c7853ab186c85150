import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/test/*.test.ts'],
		coverage: {
			exclude: [
				'vitest.config.ts',
				'dist/**',
				'packages/*/test/**',
				'packages/utransport/src/types.ts',
			],
		},
	},
});
