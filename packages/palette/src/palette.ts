/**
 * Color <-> palette index lookup
 */

import {
	type Color,
	ColorNotInPaletteError,
	IndexOutOfRangeError,
	isIntegerBelow,
	type PaletteIndex,
} from '@pixelframe/core'
import { COLOR_NAMES, PALETTE, PALETTE_SIZE } from './constants'

export function isPaletteIndex(value: number): value is PaletteIndex {
	return isIntegerBelow(value, PALETTE_SIZE)
}

export function isPaletteColor(color: Color): boolean {
	return PALETTE.includes(color)
}

/**
 * Throw unless value is a valid palette index
 */
export function assertPaletteIndex(value: number): asserts value is PaletteIndex {
	if (!isPaletteIndex(value)) {
		throw new IndexOutOfRangeError(value, PALETTE_SIZE)
	}
}

/**
 * Find the index of a palette color (exact match only)
 */
export function colorIndex(color: Color): PaletteIndex {
	for (let i = 0; i < PALETTE_SIZE; i++) {
		if (PALETTE[i] === color) return i
	}
	throw new ColorNotInPaletteError(color)
}

export function colorFromIndex(index: PaletteIndex): Color {
	assertPaletteIndex(index)
	return PALETTE[index]!
}

export function colorName(index: PaletteIndex): string {
	assertPaletteIndex(index)
	return COLOR_NAMES[index]!
}

/**
 * Map colors to indices, failing on the first color outside the palette
 */
export function colorsToIndices(colors: readonly Color[]): PaletteIndex[] {
	return colors.map(colorIndex)
}

/**
 * Map indices to colors, failing on the first invalid index
 */
export function indicesToColors(indices: ArrayLike<PaletteIndex>): Color[] {
	return Array.from(indices, colorFromIndex)
}
