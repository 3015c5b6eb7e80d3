/**
 * 2-bit index packing, 4 indices per byte.
 *
 * Position 0 occupies bits 0-1, position 3 occupies bits 6-7.
 */

import { isIntegerBelow, type PaletteIndex, PositionOutOfRangeError, TooManyIndicesError } from '@pixelframe/core'
import { BITS_PER_INDEX, INDEX_MASK, INDICES_PER_BYTE } from './constants'
import { assertPaletteIndex } from './palette'

function assertPosition(position: number): void {
	if (!isIntegerBelow(position, INDICES_PER_BYTE)) {
		throw new PositionOutOfRangeError(position, INDICES_PER_BYTE)
	}
}

/**
 * Pack up to 4 indices into one byte, first index in the low bits
 */
export function packIndices(indices: readonly PaletteIndex[]): number {
	if (indices.length > INDICES_PER_BYTE) {
		throw new TooManyIndicesError(indices.length, INDICES_PER_BYTE)
	}

	let byte = 0
	for (let i = 0; i < indices.length; i++) {
		const index = indices[i]!
		assertPaletteIndex(index)
		byte |= index << (i * BITS_PER_INDEX)
	}
	return byte
}

export function unpackIndices(byte: number): PaletteIndex[] {
	const indices: PaletteIndex[] = []
	for (let i = 0; i < INDICES_PER_BYTE; i++) {
		indices.push((byte >> (i * BITS_PER_INDEX)) & INDEX_MASK)
	}
	return indices
}

export function indexAtPosition(byte: number, position: number): PaletteIndex {
	assertPosition(position)
	return (byte >> (position * BITS_PER_INDEX)) & INDEX_MASK
}

/**
 * Replace the 2-bit field at position, returning the new byte
 */
export function setIndexAtPosition(byte: number, position: number, index: PaletteIndex): number {
	assertPosition(position)
	assertPaletteIndex(index)

	const shift = position * BITS_PER_INDEX
	return ((byte & ~(INDEX_MASK << shift)) | (index << shift)) & 0xff
}

/**
 * Byte with every position set to index
 */
export function fillByte(index: PaletteIndex): number {
	assertPaletteIndex(index)
	return index * 0x55
}
