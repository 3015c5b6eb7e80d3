/**
 * pixelframe CLI - build, edit and print packed pixel frames
 */

import { writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { type Color, isPixelFrameError, parseColor, type PaletteIndex, PixelFrameError } from '@pixelframe/core'
import { type FrameEvent, frameFromHex, frameToHex, PixelFrame } from '@pixelframe/frame'
import { describeFrame, renderAscii, renderSvg } from '@pixelframe/render'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type OutputFormat = 'ascii' | 'svg' | 'hex' | 'info'

export type EditStep =
	| { kind: 'fill'; index: PaletteIndex }
	| { kind: 'set'; x: number; y: number; index: PaletteIndex }
	| { kind: 'color'; x: number; y: number; color: Color }

export interface CliOptions {
	size: number
	load?: string
	format: OutputFormat

	// SVG
	scale?: number
	background?: PaletteIndex

	// Output
	out?: string

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export class UsageError extends PixelFrameError {
	constructor(message: string) {
		super(message, 'USAGE')
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const FORMATS: readonly OutputFormat[] = ['ascii', 'svg', 'hex', 'info']

const DEFAULT_SIZE = 8

export const HELP = `
pixelframe - 4-color pixel frames packed at 2 bits per pixel

USAGE:
  npm run cli -- [options]            Build a frame, apply edits, print it

EDITS (applied in order):
  --fill <index>        Reset every pixel to a palette index
  --set <x,y,index>     Set one pixel by palette index
  --color <x,y,color>   Set one pixel by color (#8c1c84, 45a2f8, 0xffffff)

OPTIONS:
  -s, --size <n>        Frame size, 0-255 (default 8)
  -l, --load <hex>      Start from raw packed bytes in hex
  -f, --format <fmt>    Output: ascii, svg, hex, info (default ascii)
  --scale <n>           SVG pixels per frame pixel (default 10)
  --background <index>  SVG background index
  -o, --out <file>      Write output to a file
  -v, --verbose         Log every edit
  --quiet               Suppress status output
  --help                Show this help
  --version             Show version

PALETTE:
  0 White #ffffff   1 Black #000000   2 Purple #8c1c84   3 Blue #45a2f8

EXAMPLES:
  npm run cli -- --set 5,2,2 --set 2,5,3              # Two pixels on an 8x8 frame
  npm run cli -- -s 16 --fill 1 --format svg -o a.svg  # Black 16x16 SVG
  npm run cli -- -s 2 --load e4 --format info         # Inspect raw bytes
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

function parseInteger(text: string, flag: string): number {
	if (!/^-?\d+$/.test(text.trim())) {
		throw new UsageError(`Expected an integer for ${flag}, got ${JSON.stringify(text)}`)
	}
	return Number.parseInt(text, 10)
}

function parseTriple(text: string, flag: string, last: string): [number, number, string] {
	const parts = text.split(',')
	if (parts.length !== 3) {
		throw new UsageError(`Expected x,y,${last} for ${flag}, got ${JSON.stringify(text)}`)
	}
	const [x = '', y = '', value = ''] = parts
	return [parseInteger(x, flag), parseInteger(y, flag), value.trim()]
}

export function parseArgs(args: string[]): { steps: EditStep[]; options: CliOptions } {
	const steps: EditStep[] = []
	const options: CliOptions = { size: DEFAULT_SIZE, format: 'ascii' }

	let i = 0
	const value = (flag: string): string => {
		const next = args[i + 1]
		if (next === undefined) {
			throw new UsageError(`Missing value for ${flag}`)
		}
		i++
		return next
	}

	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--size' || arg === '-s') {
			options.size = parseInteger(value(arg), arg)
		} else if (arg === '--load' || arg === '-l') {
			options.load = value(arg)
		} else if (arg === '--format' || arg === '-f') {
			const format = value(arg)
			const match = FORMATS.find((f) => f === format)
			if (!match) {
				throw new UsageError(`Unknown format: ${format} (expected ${FORMATS.join(', ')})`)
			}
			options.format = match
		} else if (arg === '--scale') {
			options.scale = parseInteger(value(arg), arg)
		} else if (arg === '--background') {
			options.background = parseInteger(value(arg), arg)
		} else if (arg === '--out' || arg === '-o') {
			options.out = value(arg)
		} else if (arg === '--fill') {
			steps.push({ kind: 'fill', index: parseInteger(value(arg), arg) })
		} else if (arg === '--set') {
			const [x, y, index] = parseTriple(value(arg), arg, 'index')
			steps.push({ kind: 'set', x, y, index: parseInteger(index, arg) })
		} else if (arg === '--color') {
			const [x, y, color] = parseTriple(value(arg), arg, 'color')
			steps.push({ kind: 'color', x, y, color: parseColor(color) })
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}
		i++
	}

	return { steps, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Frame
// ─────────────────────────────────────────────────────────────────────────────

function applyStep(frame: PixelFrame, step: EditStep): void {
	switch (step.kind) {
		case 'fill':
			frame.reset(step.index)
			break
		case 'set':
			frame.setPixel(step.x, step.y, step.index)
			break
		case 'color':
			frame.setPixelByColor(step.x, step.y, step.color)
			break
	}
}

function formatEvent(event: FrameEvent): string {
	switch (event.type) {
		case 'pixel':
			return `set (${event.x}, ${event.y}) -> ${event.index}`
		case 'batch':
			return `batch of ${event.count}`
		case 'reset':
			return `reset -> ${event.index}`
	}
}

export function formatFrame(frame: PixelFrame, options: CliOptions): string {
	switch (options.format) {
		case 'ascii':
			return renderAscii(frame)
		case 'svg':
			return renderSvg(frame, { scale: options.scale, background: options.background })
		case 'hex':
			return frameToHex(frame)
		case 'info':
			return describeFrame(frame)
	}
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	return `${(bytes / 1024).toFixed(1)} KB`
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return its exit code. Frame and usage errors are reported
 * on stderr; anything else propagates.
 */
export function run(args: string[]): number {
	try {
		const { steps, options } = parseArgs(args)

		if (options.help) {
			console.log(HELP)
			return 0
		}
		if (options.version) {
			console.log(`pixelframe v${VERSION}`)
			return 0
		}

		const frame =
			options.load !== undefined ? frameFromHex(options.size, options.load) : new PixelFrame(options.size)

		if (options.verbose) {
			frame.subscribe((event) => console.error(formatEvent(event)))
		}

		for (const step of steps) {
			applyStep(frame, step)
		}

		const output = formatFrame(frame, options)

		if (options.out === undefined) {
			console.log(output)
			return 0
		}

		const outputPath = resolve(options.out)
		const content = `${output}\n`
		writeFileSync(outputPath, content)
		if (!options.quiet) {
			console.log(`Wrote ${outputPath} (${formatBytes(Buffer.byteLength(content))})`)
		}
		return 0
	} catch (error) {
		if (!isPixelFrameError(error)) throw error
		console.error(`Error: ${error.message}`)
		return 1
	}
}
