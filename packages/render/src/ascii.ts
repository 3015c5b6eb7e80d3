/**
 * Text grid view of a frame
 */

import { type FrameView, InvalidBufferError } from '@pixelframe/core'
import { assertPaletteIndex, PALETTE_SIZE } from '@pixelframe/palette'
import { type AsciiOptions, InvalidGlyphsError } from './types'

const DEFAULT_GLYPHS = ['0', '1', '2', '3']

export function renderAscii(frame: FrameView, options: AsciiOptions = {}): string {
	const glyphs = options.glyphs ?? DEFAULT_GLYPHS
	const separator = options.separator ?? ' '
	if (glyphs.length !== PALETTE_SIZE) {
		throw new InvalidGlyphsError(glyphs.length)
	}

	const { size } = frame
	const indices = frame.getAllIndices()
	if (indices.length !== size * size) {
		throw new InvalidBufferError(`Expected ${size * size} indices, got ${indices.length}`)
	}
	const rows: string[] = []

	for (let y = 0; y < size; y++) {
		const cells: string[] = []
		for (let x = 0; x < size; x++) {
			const index = indices[y * size + x]!
			assertPaletteIndex(index)
			cells.push(glyphs[index]!)
		}
		rows.push(cells.join(separator))
	}

	return rows.join('\n')
}
