/**
 * @pixelframe/palette - Fixed 4-color palette and packed index codec
 */

export * from './constants'
export * from './palette'
export * from './packing'
