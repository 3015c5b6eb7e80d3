/**
 * Hex form of the raw packed bytes
 */

import { bytesToHex, hexToBytes } from '@pixelframe/core'
import { PixelFrame } from './frame'

export function frameToHex(frame: PixelFrame): string {
	return bytesToHex(frame.getRawBytes())
}

export function frameFromHex(size: number, hex: string): PixelFrame {
	return PixelFrame.fromRawBytes(size, hexToBytes(hex))
}
