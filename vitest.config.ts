import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@slotkeeper/core': pkg('core'),
			'@slotkeeper/access': pkg('access'),
			'@slotkeeper/scheduler': pkg('scheduler'),
		},
	},
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
		environment: 'node',
	},
});
