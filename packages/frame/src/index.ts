/**
 * @pixelframe/frame - Packed 2-bit pixel frames
 */

export * from './types'
export * from './frame'
export * from './serialize'
