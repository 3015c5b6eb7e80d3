/**
 * Hex text <-> bytes
 */

import { InvalidBufferError } from './errors'

const HEX_DIGITS = '0123456789abcdef'

/**
 * Encode bytes as lower-case hex, two characters per byte
 */
export function bytesToHex(bytes: Uint8Array): string {
	let out = ''
	for (let i = 0; i < bytes.length; i++) {
		const byte = bytes[i]!
		out += HEX_DIGITS[byte >> 4]! + HEX_DIGITS[byte & 0x0f]!
	}
	return out
}

/**
 * Decode hex text; an optional 0x prefix and whitespace are ignored
 */
export function hexToBytes(text: string): Uint8Array {
	let clean = text.replace(/\s+/g, '')
	if (clean.startsWith('0x') || clean.startsWith('0X')) {
		clean = clean.slice(2)
	}

	if (clean.length % 2 !== 0) {
		throw new InvalidBufferError('Hex input has an odd number of digits', { length: clean.length })
	}
	if (!/^[0-9a-fA-F]*$/.test(clean)) {
		throw new InvalidBufferError('Hex input contains non-hex characters')
	}

	const bytes = new Uint8Array(clean.length / 2)
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(clean.slice(i * 2, i * 2 + 2), 16)
	}
	return bytes
}
