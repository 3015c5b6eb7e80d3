/**
 * Error taxonomy shared by every pixelframe package
 */

export type ErrorContext = Record<string, unknown>

/**
 * Base class for all pixelframe errors
 */
export class PixelFrameError extends Error {
	readonly code: string
	readonly context: ErrorContext

	constructor(message: string, code: string, context: ErrorContext = {}) {
		super(message)
		this.name = new.target.name
		this.code = code
		this.context = context

		Error.captureStackTrace(this, new.target)
	}

	/**
	 * JSON-serializable view of the error
	 */
	toJSON(): { name: string; message: string; code: string; context: ErrorContext } {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		}
	}
}

export class CoordinatesOutOfBoundsError extends PixelFrameError {
	constructor(x: number, y: number, size: number) {
		super(`Coordinates (${x}, ${y}) out of bounds for ${size}x${size} frame`, 'COORDINATES_OUT_OF_BOUNDS', {
			x,
			y,
			size,
		})
	}
}

export class ColorNotInPaletteError extends PixelFrameError {
	constructor(color: number) {
		super(`Color ${formatColor(color)} is not in the palette`, 'COLOR_NOT_IN_PALETTE', { color })
	}
}

export class IndexOutOfRangeError extends PixelFrameError {
	constructor(index: number, limit: number) {
		super(`Palette index ${index} out of range (0-${limit - 1})`, 'INDEX_OUT_OF_RANGE', { index, limit })
	}
}

export class PositionOutOfRangeError extends PixelFrameError {
	constructor(position: number, limit: number) {
		super(`Byte position ${position} out of range (0-${limit - 1})`, 'POSITION_OUT_OF_RANGE', {
			position,
			limit,
		})
	}
}

export class ArrayLengthMismatchError extends PixelFrameError {
	constructor(lengths: readonly number[]) {
		super(`Array lengths do not match: ${lengths.join(', ')}`, 'ARRAY_LENGTH_MISMATCH', { lengths })
	}
}

export class TooManyIndicesError extends PixelFrameError {
	constructor(count: number, limit: number) {
		super(`Cannot pack ${count} indices into one byte (max ${limit})`, 'TOO_MANY_INDICES', { count, limit })
	}
}

export class InvalidSizeError extends PixelFrameError {
	constructor(size: number, limit: number) {
		super(`Invalid frame size ${size} (expected 0-${limit})`, 'INVALID_SIZE', { size, limit })
	}
}

export class InvalidBufferError extends PixelFrameError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, 'INVALID_BUFFER', context)
	}
}

export class InvalidColorError extends PixelFrameError {
	constructor(input: string) {
		super(`Invalid color: ${JSON.stringify(input)}`, 'INVALID_COLOR', { input })
	}
}

/**
 * Narrow an unknown thrown value to a pixelframe error
 */
export function isPixelFrameError(value: unknown): value is PixelFrameError {
	return value instanceof PixelFrameError
}

function formatColor(color: number): string {
	if (!Number.isInteger(color) || color < 0) return String(color)
	return `0x${color.toString(16).toUpperCase().padStart(6, '0')}`
}
