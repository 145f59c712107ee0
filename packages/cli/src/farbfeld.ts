/**
 * Farbfeld: the plain layer format the command line reads and writes
 * https://tools.suckless.org/farbfeld/
 *
 * "farbfeld" magic, u32 BE width and height, then 16-bit BE RGBA per pixel
 */

import { ConversionError, type ImageData } from '@vtfkit/core'

// "farbfeld"
export const FARBFELD_MAGIC = new Uint8Array([0x66, 0x61, 0x72, 0x62, 0x66, 0x65, 0x6c, 0x64])

const HEADER_SIZE = 16

export function isFarbfeld(data: Uint8Array): boolean {
	if (data.length < HEADER_SIZE) return false
	return FARBFELD_MAGIC.every((byte, i) => data[i] === byte)
}

/**
 * Decode to 8-bit RGBA, keeping the high byte of every channel
 */
export function decodeFarbfeld(data: Uint8Array): ImageData {
	if (!isFarbfeld(data)) {
		throw new ConversionError('ParseError', 'Invalid farbfeld: wrong magic number')
	}

	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	const width = view.getUint32(8, false)
	const height = view.getUint32(12, false)
	if (width === 0 || height === 0) {
		throw new ConversionError('ParseError', `Invalid farbfeld dimensions: ${width}x${height}`)
	}

	const pixels = width * height
	if (data.length < HEADER_SIZE + pixels * 8) {
		throw new ConversionError('ParseError', `Farbfeld data truncated: ${width}x${height} needs ${HEADER_SIZE + pixels * 8} bytes, got ${data.length}`)
	}

	const out = new Uint8Array(pixels * 4)
	for (let i = 0; i < pixels * 4; i++) {
		out[i] = view.getUint16(HEADER_SIZE + i * 2, false) >> 8
	}
	return { width, height, data: out }
}

/**
 * Encode 8-bit RGBA, widening each channel as v * 257
 */
export function encodeFarbfeld(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const output = new Uint8Array(HEADER_SIZE + width * height * 8)
	const view = new DataView(output.buffer)

	output.set(FARBFELD_MAGIC, 0)
	view.setUint32(8, width, false)
	view.setUint32(12, height, false)

	for (let i = 0; i < width * height * 4; i++) {
		view.setUint16(HEADER_SIZE + i * 2, data[i] * 257, false)
	}
	return output
}
