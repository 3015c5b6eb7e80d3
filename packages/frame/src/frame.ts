/**
 * Square pixel frame stored as packed 2-bit palette indices.
 *
 * Pixels are numbered row-major (p = y * size + x); pixel p lives in byte
 * p >> 2 at position p & 3, position 0 being the two least-significant bits.
 */

import {
	ArrayLengthMismatchError,
	type Color,
	CoordinatesOutOfBoundsError,
	type FrameView,
	InvalidBufferError,
	InvalidSizeError,
	isIntegerBelow,
	MAX_FRAME_SIZE,
	type PaletteIndex,
} from '@pixelframe/core'
import {
	assertPaletteIndex,
	colorFromIndex,
	colorIndex,
	fillByte,
	indexAtPosition,
	INDICES_PER_BYTE,
	PALETTE_SIZE,
	setIndexAtPosition,
	unpackIndices,
} from '@pixelframe/palette'
import type { FrameEvent, FrameListener } from './types'

interface PixelWrite {
	byte: number
	position: number
	index: PaletteIndex
}

export class PixelFrame implements FrameView {
	readonly size: number
	readonly totalPixels: number
	readonly totalBytes: number

	private readonly buffer: Uint8Array
	private readonly listeners = new Set<FrameListener>()

	constructor(size: number) {
		if (!Number.isInteger(size) || size < 0 || size > MAX_FRAME_SIZE) {
			throw new InvalidSizeError(size, MAX_FRAME_SIZE)
		}

		this.size = size
		this.totalPixels = size * size
		this.totalBytes = Math.ceil(this.totalPixels / INDICES_PER_BYTE)
		this.buffer = new Uint8Array(this.totalBytes)
	}

	/**
	 * Rebuild a frame from its raw packed bytes
	 */
	static fromRawBytes(size: number, bytes: Uint8Array): PixelFrame {
		const frame = new PixelFrame(size)
		if (bytes.length !== frame.totalBytes) {
			throw new InvalidBufferError(
				`Expected ${frame.totalBytes} bytes for ${size}x${size} frame, got ${bytes.length}`,
				{ size, expected: frame.totalBytes, actual: bytes.length }
			)
		}
		frame.buffer.set(bytes)
		return frame
	}

	setPixel(x: number, y: number, index: PaletteIndex): void {
		const write = this.locate(x, y, index)
		this.apply(write)
		this.emit({ type: 'pixel', x, y, index })
	}

	getPixel(x: number, y: number): PaletteIndex {
		const p = this.offset(x, y)
		return indexAtPosition(this.buffer[p >> 2]!, p & 3)
	}

	setPixelByColor(x: number, y: number, color: Color): void {
		this.setPixel(x, y, colorIndex(color))
	}

	getPixelColor(x: number, y: number): Color {
		return colorFromIndex(this.getPixel(x, y))
	}

	/**
	 * Copy of the packed buffer, ceil(size² / 4) bytes
	 */
	getRawBytes(): Uint8Array {
		return this.buffer.slice()
	}

	/**
	 * Every pixel's index in row-major order
	 */
	getAllIndices(): Uint8Array {
		const indices = new Uint8Array(this.totalPixels)

		for (let i = 0; i < this.totalBytes; i++) {
			const base = i * INDICES_PER_BYTE
			const fields = unpackIndices(this.buffer[i]!)
			for (let j = 0; j < INDICES_PER_BYTE && base + j < this.totalPixels; j++) {
				indices[base + j] = fields[j]!
			}
		}

		return indices
	}

	getAllColors(): Color[] {
		return Array.from(this.getAllIndices(), colorFromIndex)
	}

	/**
	 * Pixel count per palette index
	 */
	countPixels(): number[] {
		const counts = new Array<number>(PALETTE_SIZE).fill(0)
		for (const index of this.getAllIndices()) {
			counts[index] = counts[index]! + 1
		}
		return counts
	}

	/**
	 * Overwrite every byte with a template of fillIndex
	 */
	reset(fillIndex: PaletteIndex = 0): void {
		this.buffer.fill(fillByte(fillIndex))
		this.emit({ type: 'reset', index: fillIndex })
	}

	/**
	 * Write many pixels at once. Every entry is validated before any write,
	 * so a failing batch leaves the frame untouched.
	 */
	batchSetPixels(xs: readonly number[], ys: readonly number[], indices: readonly PaletteIndex[]): void {
		if (xs.length !== ys.length || xs.length !== indices.length) {
			throw new ArrayLengthMismatchError([xs.length, ys.length, indices.length])
		}

		const writes = xs.map((x, i) => this.locate(x, ys[i]!, indices[i]!))
		this.commit(writes)
	}

	batchSetPixelsByColor(xs: readonly number[], ys: readonly number[], colors: readonly Color[]): void {
		if (xs.length !== ys.length || xs.length !== colors.length) {
			throw new ArrayLengthMismatchError([xs.length, ys.length, colors.length])
		}

		const writes = xs.map((x, i) => {
			const y = ys[i]!
			this.offset(x, y)
			return this.locate(x, y, colorIndex(colors[i]!))
		})
		this.commit(writes)
	}

	/**
	 * Independent copy with no listeners
	 */
	clone(): PixelFrame {
		return PixelFrame.fromRawBytes(this.size, this.buffer)
	}

	/**
	 * Register a change listener; returns the unsubscribe function
	 */
	subscribe(listener: FrameListener): () => void {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	private offset(x: number, y: number): number {
		if (!isIntegerBelow(x, this.size) || !isIntegerBelow(y, this.size)) {
			throw new CoordinatesOutOfBoundsError(x, y, this.size)
		}
		return y * this.size + x
	}

	private locate(x: number, y: number, index: PaletteIndex): PixelWrite {
		const p = this.offset(x, y)
		assertPaletteIndex(index)
		return { byte: p >> 2, position: p & 3, index }
	}

	private apply({ byte, position, index }: PixelWrite): void {
		this.buffer[byte] = setIndexAtPosition(this.buffer[byte]!, position, index)
	}

	private commit(writes: readonly PixelWrite[]): void {
		for (const write of writes) {
			this.apply(write)
		}
		this.emit({ type: 'batch', count: writes.length })
	}

	/**
	 * Every listener runs even if an earlier one throws; the first error is
	 * rethrown afterwards. The write is already committed at that point.
	 */
	private emit(event: FrameEvent): void {
		const errors: unknown[] = []
		for (const listener of this.listeners) {
			try {
				listener(event)
			} catch (error) {
				errors.push(error)
			}
		}
		if (errors.length > 0) {
			throw errors[0]
		}
	}
}
