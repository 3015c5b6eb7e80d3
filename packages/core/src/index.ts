/**
 * @pixelframe/core - Shared types, errors and color packing
 */

export * from './types'
export * from './errors'
export * from './color'
export * from './hex'
