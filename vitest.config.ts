import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			'@pixelframe/core': pkg('core'),
			'@pixelframe/palette': pkg('palette'),
			'@pixelframe/frame': pkg('frame'),
			'@pixelframe/render': pkg('render'),
		},
	},
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		environment: 'node',
	},
})
