import { type PaletteIndex, PixelFrameError } from '@pixelframe/core'

export interface AsciiOptions {
	/** One glyph per palette index (default: '0', '1', '2', '3') */
	glyphs?: readonly string[]
	/** Text placed between cells of a row (default: ' ') */
	separator?: string
}

export interface SvgOptions {
	/** Output pixels per frame pixel (default 10) */
	scale?: number
	/** Index drawn as one full-size rect; its pixels are skipped */
	background?: PaletteIndex
}

export class InvalidGlyphsError extends PixelFrameError {
	constructor(count: number) {
		super(`Expected 4 glyphs, got ${count}`, 'INVALID_GLYPHS', { count })
	}
}

export class InvalidScaleError extends PixelFrameError {
	constructor(scale: number) {
		super(`Invalid SVG scale ${scale} (expected a positive integer)`, 'INVALID_SCALE', { scale })
	}
}
