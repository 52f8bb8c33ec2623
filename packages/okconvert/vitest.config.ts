import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'okconvert',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
