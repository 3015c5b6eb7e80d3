#!/usr/bin/env node
/**
 * pixelframe CLI entry point
 */

import { run } from './cli'

try {
	process.exitCode = run(process.argv.slice(2))
} catch (err) {
	console.error('Fatal error:', err)
	process.exit(1)
}
