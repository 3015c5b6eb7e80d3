/**
 * @pixelframe/render - ASCII and SVG views of a frame
 */

export * from './types'
export * from './ascii'
export * from './svg'
export * from './describe'
