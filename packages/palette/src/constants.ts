import type { Color } from '@pixelframe/core'

export const WHITE: Color = 0xffffff
export const BLACK: Color = 0x000000
export const PURPLE: Color = 0x8c1c84
export const BLUE: Color = 0x45a2f8

/**
 * Canonical palette, index -> color
 */
export const PALETTE: readonly Color[] = Object.freeze([WHITE, BLACK, PURPLE, BLUE])

export const COLOR_NAMES: readonly string[] = Object.freeze(['White', 'Black', 'Purple', 'Blue'])

export const PALETTE_SIZE = 4
export const BITS_PER_INDEX = 2
export const INDICES_PER_BYTE = 8 / BITS_PER_INDEX
export const INDEX_MASK = (1 << BITS_PER_INDEX) - 1
