import type { FrameView } from '@pixelframe/core'
import { assertPaletteIndex, COLOR_NAMES, INDICES_PER_BYTE, PALETTE_SIZE } from '@pixelframe/palette'

/**
 * One-line summary, e.g. "8x8 pixel frame, 64 pixels in 16 bytes (White: 62, ...)"
 */
export function describeFrame(frame: FrameView): string {
	const { size } = frame
	const indices = frame.getAllIndices()
	const counts = new Array<number>(PALETTE_SIZE).fill(0)
	for (const index of indices) {
		assertPaletteIndex(index)
		counts[index] = counts[index]! + 1
	}

	const bytes = Math.ceil(indices.length / INDICES_PER_BYTE)
	const breakdown = COLOR_NAMES.map((name, i) => `${name}: ${counts[i]}`).join(', ')

	return `${size}x${size} pixel frame, ${indices.length} pixels in ${bytes} bytes (${breakdown})`
}
