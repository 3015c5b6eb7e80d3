/**
 * SVG document view of a frame.
 *
 * Drawn in frame units (viewBox 0 0 N N) and scaled by width/height, with
 * horizontal runs of one index merged into a single rect.
 */

import { colorToHex, type FrameView, InvalidBufferError } from '@pixelframe/core'
import { assertPaletteIndex, colorFromIndex } from '@pixelframe/palette'
import { InvalidScaleError, type SvgOptions } from './types'

const DEFAULT_SCALE = 10

export function renderSvg(frame: FrameView, options: SvgOptions = {}): string {
	const scale = options.scale ?? DEFAULT_SCALE
	if (!Number.isInteger(scale) || scale <= 0) {
		throw new InvalidScaleError(scale)
	}
	const { background } = options
	if (background !== undefined) {
		assertPaletteIndex(background)
	}

	const { size } = frame
	const indices = frame.getAllIndices()
	if (indices.length !== size * size) {
		throw new InvalidBufferError(`Expected ${size * size} indices, got ${indices.length}`)
	}
	const extent = size * scale

	const parts: string[] = [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${extent}" height="${extent}" viewBox="0 0 ${size} ${size}" shape-rendering="crispEdges">`,
	]

	if (background !== undefined && size > 0) {
		parts.push(rect(0, 0, size, size, background))
	}

	for (let y = 0; y < size; y++) {
		let x = 0
		while (x < size) {
			const index = indices[y * size + x]!
			let run = 1
			while (x + run < size && indices[y * size + x + run] === index) run++

			if (index !== background) {
				parts.push(rect(x, y, run, 1, index))
			}
			x += run
		}
	}

	parts.push('</svg>')
	return parts.join('')
}

function rect(x: number, y: number, width: number, height: number, index: number): string {
	return `<rect x="${x}" y="${y}" width="${width}" height="${height}" fill="${colorToHex(colorFromIndex(index))}"/>`
}
