/**
 * 24-bit color packing
 */

import { InvalidColorError } from './errors'
import type { Color, RGB } from './types'

/**
 * Pack 8-bit channels into 0xRRGGBB
 */
export function packColor(red: number, green: number, blue: number): Color {
	return ((red & 0xff) << 16) | ((green & 0xff) << 8) | (blue & 0xff)
}

/**
 * Split 0xRRGGBB into its channels
 */
export function unpackColor(color: Color): RGB {
	return [unpackRed(color), unpackGreen(color), unpackBlue(color)]
}

export function unpackRed(color: Color): number {
	return (color >> 16) & 0xff
}

export function unpackGreen(color: Color): number {
	return (color >> 8) & 0xff
}

export function unpackBlue(color: Color): number {
	return color & 0xff
}

/**
 * Format as lower-case #rrggbb
 */
export function colorToHex(color: Color): string {
	return `#${(color & 0xffffff).toString(16).padStart(6, '0')}`
}

/**
 * Parse #rrggbb, rrggbb or 0xrrggbb
 */
export function parseColor(text: string): Color {
	const match = text.trim().match(/^(?:#|0x)?([0-9a-fA-F]{6})$/)
	if (!match) {
		throw new InvalidColorError(text)
	}
	return Number.parseInt(match[1]!, 16)
}
