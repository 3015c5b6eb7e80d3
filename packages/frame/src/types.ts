import type { PaletteIndex } from '@pixelframe/core'

/**
 * Change notifications emitted by a frame
 */
export type FrameEvent =
	| { readonly type: 'pixel'; readonly x: number; readonly y: number; readonly index: PaletteIndex }
	| { readonly type: 'batch'; readonly count: number }
	| { readonly type: 'reset'; readonly index: PaletteIndex }

export type FrameListener = (event: FrameEvent) => void
