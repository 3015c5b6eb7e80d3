/**
 * A 24-bit color, packed as 0xRRGGBB
 */
export type Color = number

/** RGB color, each channel 0-255 */
export type RGB = [number, number, number]

/**
 * Palette index (0-3), stored in 2 bits
 */
export type PaletteIndex = number

/**
 * Read surface of a frame, enough to render it without the packed layout
 */
export interface FrameView {
	readonly size: number
	/** Every pixel's palette index, row-major */
	getAllIndices(): Uint8Array
}

/**
 * Largest supported frame edge, in pixels
 */
export const MAX_FRAME_SIZE = 255

/**
 * Check that a value is a whole number in [0, limit)
 */
export function isIntegerBelow(value: number, limit: number): boolean {
	return Number.isInteger(value) && value >= 0 && value < limit
}
