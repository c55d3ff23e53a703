import { defineConfig } from 'vitest/config';

// Local-time and DST behaviour is asserted against a fixed zone; forked workers inherit it.
process.env.TZ = 'America/New_York';

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts'],
		pool: 'forks',
		environment: 'node',
	},
});
