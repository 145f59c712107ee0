/**
 * Pixel format conversion to and from RGBA8888
 */

import { decodeATI1N, decodeATI2N, decodeDXT1, decodeDXT3, decodeDXT5 } from './dxt'
import { formatName, getImageSize } from './formats'
import { VTF_FORMAT } from './types'

/** r/g/b/a channels, l = luminance, x = unused (written as 255) */
type Channel = 'r' | 'g' | 'b' | 'a' | 'l' | 'x'

/**
 * One byte per channel, in storage order
 */
const BYTE_LAYOUTS = new Map<number, readonly Channel[]>([
	[VTF_FORMAT.RGBA8888, ['r', 'g', 'b', 'a']],
	[VTF_FORMAT.ABGR8888, ['a', 'b', 'g', 'r']],
	[VTF_FORMAT.RGB888, ['r', 'g', 'b']],
	[VTF_FORMAT.BGR888, ['b', 'g', 'r']],
	[VTF_FORMAT.RGB888_BLUESCREEN, ['r', 'g', 'b']],
	[VTF_FORMAT.BGR888_BLUESCREEN, ['b', 'g', 'r']],
	[VTF_FORMAT.ARGB8888, ['a', 'r', 'g', 'b']],
	[VTF_FORMAT.BGRA8888, ['b', 'g', 'r', 'a']],
	[VTF_FORMAT.BGRX8888, ['b', 'g', 'r', 'x']],
	[VTF_FORMAT.RGBX8888, ['r', 'g', 'b', 'x']],
	[VTF_FORMAT.UVWQ8888, ['r', 'g', 'b', 'a']],
	[VTF_FORMAT.UVLX8888, ['r', 'g', 'b', 'a']],
	[VTF_FORMAT.UV88, ['r', 'g']],
	[VTF_FORMAT.I8, ['l']],
	[VTF_FORMAT.IA88, ['l', 'a']],
	[VTF_FORMAT.A8, ['a']],
	[VTF_FORMAT.R8, ['r']],
])

/**
 * Little-endian packed words, channels listed from the lowest bits up
 */
const PACKED_LAYOUTS = new Map<number, readonly [Channel, number][]>([
	[VTF_FORMAT.RGB565, [['r', 5], ['g', 6], ['b', 5]]],
	[VTF_FORMAT.BGR565, [['b', 5], ['g', 6], ['r', 5]]],
	[VTF_FORMAT.BGRX5551, [['b', 5], ['g', 5], ['r', 5], ['x', 1]]],
	[VTF_FORMAT.BGRA5551, [['b', 5], ['g', 5], ['r', 5], ['a', 1]]],
	[VTF_FORMAT.BGRA4444, [['b', 4], ['g', 4], ['r', 4], ['a', 4]]],
	[VTF_FORMAT.RGBA1010102, [['r', 10], ['g', 10], ['b', 10], ['a', 2]]],
	[VTF_FORMAT.BGRA1010102, [['b', 10], ['g', 10], ['r', 10], ['a', 2]]],
])

type WideKind = 'unorm16' | 'half' | 'float'

interface WideLayout {
	readonly channels: readonly Channel[]
	readonly kind: WideKind
}

/**
 * 16-bit and 32-bit per channel formats
 */
const WIDE_LAYOUTS = new Map<number, WideLayout>([
	[VTF_FORMAT.RGBA16161616, { channels: ['r', 'g', 'b', 'a'], kind: 'unorm16' }],
	[VTF_FORMAT.RGBA16161616F, { channels: ['r', 'g', 'b', 'a'], kind: 'half' }],
	[VTF_FORMAT.R16F, { channels: ['r'], kind: 'half' }],
	[VTF_FORMAT.RG1616F, { channels: ['r', 'g'], kind: 'half' }],
	[VTF_FORMAT.R32F, { channels: ['r'], kind: 'float' }],
	[VTF_FORMAT.RG3232F, { channels: ['r', 'g'], kind: 'float' }],
	[VTF_FORMAT.RGB323232F, { channels: ['r', 'g', 'b'], kind: 'float' }],
	[VTF_FORMAT.RGBA32323232F, { channels: ['r', 'g', 'b', 'a'], kind: 'float' }],
])

const CHANNEL_OFFSET: Record<'r' | 'g' | 'b' | 'a', number> = { r: 0, g: 1, b: 2, a: 3 }

export function canDecodeFormat(format: number): boolean {
	return (
		format === VTF_FORMAT.DXT1 ||
		format === VTF_FORMAT.DXT1_ONE_BIT_ALPHA ||
		format === VTF_FORMAT.DXT3 ||
		format === VTF_FORMAT.DXT5 ||
		format === VTF_FORMAT.ATI1N ||
		format === VTF_FORMAT.ATI2N ||
		canEncodeFormat(format)
	)
}

/**
 * Block formats and P8 (no palette in the container) cannot be written
 */
export function canEncodeFormat(format: number): boolean {
	return BYTE_LAYOUTS.has(format) || PACKED_LAYOUTS.has(format) || WIDE_LAYOUTS.has(format)
}

/**
 * Decode one image to RGBA8888
 */
export function decodeToRgba(format: number, src: Uint8Array, width: number, height: number): Uint8Array {
	const expected = getImageSize(format, width, height)
	if (src.length < expected) {
		throw new Error(
			`${formatName(format)} image data too short: expected ${expected} bytes, got ${src.length}`
		)
	}

	switch (format) {
		case VTF_FORMAT.DXT1:
			return decodeDXT1(src, width, height, false)
		case VTF_FORMAT.DXT1_ONE_BIT_ALPHA:
			return decodeDXT1(src, width, height, true)
		case VTF_FORMAT.DXT3:
			return decodeDXT3(src, width, height)
		case VTF_FORMAT.DXT5:
			return decodeDXT5(src, width, height)
		case VTF_FORMAT.ATI1N:
			return decodeATI1N(src, width, height)
		case VTF_FORMAT.ATI2N:
			return decodeATI2N(src, width, height)
	}

	const pixels = width * height
	const dst = new Uint8Array(pixels * 4)

	const byteLayout = BYTE_LAYOUTS.get(format)
	if (byteLayout) {
		decodeBytes(src, dst, pixels, byteLayout)
		if (format === VTF_FORMAT.RGB888_BLUESCREEN || format === VTF_FORMAT.BGR888_BLUESCREEN) {
			applyBluescreen(dst)
		}
		return dst
	}

	const packedLayout = PACKED_LAYOUTS.get(format)
	if (packedLayout) {
		decodePacked(src, dst, pixels, packedLayout)
		return dst
	}

	const wideLayout = WIDE_LAYOUTS.get(format)
	if (wideLayout) {
		decodeWide(src, dst, pixels, wideLayout)
		return dst
	}

	throw new Error(`Unsupported VTF format for decoding: ${formatName(format)}`)
}

/**
 * Encode RGBA8888 pixels into a storage format
 */
export function encodeFromRgba(format: number, rgba: Uint8Array, width: number, height: number): Uint8Array {
	const pixels = width * height
	if (rgba.length !== pixels * 4) {
		throw new Error(`RGBA buffer has ${rgba.length} bytes, expected ${pixels * 4}`)
	}

	const dst = new Uint8Array(getImageSize(format, width, height))

	const byteLayout = BYTE_LAYOUTS.get(format)
	if (byteLayout) {
		const bluescreen =
			format === VTF_FORMAT.RGB888_BLUESCREEN || format === VTF_FORMAT.BGR888_BLUESCREEN
		encodeBytes(bluescreen ? toBluescreen(rgba) : rgba, dst, pixels, byteLayout)
		return dst
	}

	const packedLayout = PACKED_LAYOUTS.get(format)
	if (packedLayout) {
		encodePacked(rgba, dst, pixels, packedLayout)
		return dst
	}

	const wideLayout = WIDE_LAYOUTS.get(format)
	if (wideLayout) {
		encodeWide(rgba, dst, pixels, wideLayout)
		return dst
	}

	throw new Error(`Unsupported VTF format for encoding: ${formatName(format)}`)
}

/**
 * Re-encode an image from one storage format to another
 */
export function convertImage(
	src: Uint8Array,
	from: number,
	to: number,
	width: number,
	height: number
): Uint8Array {
	if (from === to) return new Uint8Array(src)
	return encodeFromRgba(to, decodeToRgba(from, src, width, height), width, height)
}

function decodeBytes(src: Uint8Array, dst: Uint8Array, pixels: number, layout: readonly Channel[]): void {
	const stride = layout.length
	const hasColor = layout.some((c) => c !== 'a' && c !== 'x')

	for (let i = 0; i < pixels; i++) {
		const o = i * 4
		// Alpha-only formats read as white
		const base = hasColor ? 0 : 255
		dst[o] = base
		dst[o + 1] = base
		dst[o + 2] = base
		dst[o + 3] = 255

		for (let c = 0; c < stride; c++) {
			storeChannel(dst, o, layout[c], src[i * stride + c])
		}
	}
}

function encodeBytes(src: Uint8Array, dst: Uint8Array, pixels: number, layout: readonly Channel[]): void {
	const stride = layout.length
	for (let i = 0; i < pixels; i++) {
		for (let c = 0; c < stride; c++) {
			dst[i * stride + c] = loadChannel(src, i * 4, layout[c])
		}
	}
}

function decodePacked(
	src: Uint8Array,
	dst: Uint8Array,
	pixels: number,
	layout: readonly [Channel, number][]
): void {
	const view = new DataView(src.buffer, src.byteOffset, src.byteLength)
	const bytes = packedBytes(layout)

	for (let i = 0; i < pixels; i++) {
		const word = bytes === 2 ? view.getUint16(i * 2, true) : view.getUint32(i * 4, true)
		const o = i * 4
		dst[o] = 0
		dst[o + 1] = 0
		dst[o + 2] = 0
		dst[o + 3] = 255

		let shift = 0
		for (const [channel, bits] of layout) {
			const max = 2 ** bits - 1
			const value = Math.floor(word / 2 ** shift) % (max + 1)
			storeChannel(dst, o, channel, Math.round((value * 255) / max))
			shift += bits
		}
	}
}

function encodePacked(
	src: Uint8Array,
	dst: Uint8Array,
	pixels: number,
	layout: readonly [Channel, number][]
): void {
	const view = new DataView(dst.buffer, dst.byteOffset, dst.byteLength)
	const bytes = packedBytes(layout)

	for (let i = 0; i < pixels; i++) {
		let word = 0
		let shift = 0
		for (const [channel, bits] of layout) {
			const max = 2 ** bits - 1
			word += Math.round((loadChannel(src, i * 4, channel) * max) / 255) * 2 ** shift
			shift += bits
		}
		if (bytes === 2) {
			view.setUint16(i * 2, word, true)
		} else {
			view.setUint32(i * 4, word, true)
		}
	}
}

function packedBytes(layout: readonly [Channel, number][]): number {
	return layout.reduce((sum, [, bits]) => sum + bits, 0) / 8
}

function decodeWide(src: Uint8Array, dst: Uint8Array, pixels: number, layout: WideLayout): void {
	const view = new DataView(src.buffer, src.byteOffset, src.byteLength)
	const size = layout.kind === 'float' ? 4 : 2
	const stride = layout.channels.length * size

	for (let i = 0; i < pixels; i++) {
		const o = i * 4
		dst[o] = 0
		dst[o + 1] = 0
		dst[o + 2] = 0
		dst[o + 3] = 255

		layout.channels.forEach((channel, c) => {
			storeChannel(dst, o, channel, clampByte(readWide(view, i * stride + c * size, layout.kind)))
		})
	}
}

/**
 * One channel scaled to 0-255
 */
function readWide(view: DataView, offset: number, kind: WideKind): number {
	switch (kind) {
		case 'unorm16':
			return view.getUint16(offset, true) / 257
		case 'half':
			return halfToFloat(view.getUint16(offset, true)) * 255
		case 'float':
			return view.getFloat32(offset, true) * 255
	}
}

function encodeWide(src: Uint8Array, dst: Uint8Array, pixels: number, layout: WideLayout): void {
	const view = new DataView(dst.buffer, dst.byteOffset, dst.byteLength)
	const size = layout.kind === 'float' ? 4 : 2
	const stride = layout.channels.length * size

	for (let i = 0; i < pixels; i++) {
		layout.channels.forEach((channel, c) => {
			const offset = i * stride + c * size
			const value = loadChannel(src, i * 4, channel)
			switch (layout.kind) {
				case 'unorm16':
					view.setUint16(offset, value * 257, true)
					break
				case 'half':
					view.setUint16(offset, floatToHalf(value / 255), true)
					break
				case 'float':
					view.setFloat32(offset, value / 255, true)
					break
			}
		})
	}
}

function storeChannel(dst: Uint8Array, offset: number, channel: Channel, value: number): void {
	switch (channel) {
		case 'x':
			return
		case 'l':
			dst[offset] = value
			dst[offset + 1] = value
			dst[offset + 2] = value
			return
		default:
			dst[offset + CHANNEL_OFFSET[channel]] = value
	}
}

function loadChannel(src: Uint8Array, offset: number, channel: Channel): number {
	switch (channel) {
		case 'x':
			return 255
		case 'l':
			// BT.601 luma
			return Math.round(0.299 * src[offset] + 0.587 * src[offset + 1] + 0.114 * src[offset + 2])
		default:
			return src[offset + CHANNEL_OFFSET[channel]]
	}
}

/**
 * Pure blue marks a transparent texel in the bluescreen formats
 */
function applyBluescreen(rgba: Uint8Array): void {
	for (let i = 0; i < rgba.length; i += 4) {
		if (rgba[i] === 0 && rgba[i + 1] === 0 && rgba[i + 2] === 255) {
			rgba[i + 2] = 0
			rgba[i + 3] = 0
		}
	}
}

function toBluescreen(rgba: Uint8Array): Uint8Array {
	const out = new Uint8Array(rgba)
	for (let i = 0; i < out.length; i += 4) {
		if (out[i + 3] < 128) {
			out[i] = 0
			out[i + 1] = 0
			out[i + 2] = 255
		}
	}
	return out
}

function clampByte(value: number): number {
	if (Number.isNaN(value)) return 0
	return Math.max(0, Math.min(255, Math.round(value)))
}

// Half-precision float conversion
export function halfToFloat(h: number): number {
	const sign = (h >> 15) & 1
	const exponent = (h >> 10) & 0x1f
	const mantissa = h & 0x3ff

	if (exponent === 0) {
		// Zero or denormalized
		const f = (mantissa / 1024) * 2 ** -14
		return sign === 0 ? f : -f
	}

	if (exponent === 31) {
		if (mantissa === 0) {
			return sign === 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY
		}
		return Number.NaN
	}

	const result = (1 + mantissa / 1024) * 2 ** (exponent - 15)
	return sign === 0 ? result : -result
}

export function floatToHalf(value: number): number {
	if (Number.isNaN(value)) return 0x7e00
	const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0
	const f = Math.abs(value)

	if (f === Number.POSITIVE_INFINITY) return sign | 0x7c00
	if (f >= 65520) return sign | 0x7c00 // Rounds past the largest half
	if (f < 2 ** -14) {
		// Denormalized (or zero)
		return sign | Math.round(f * 2 ** 24)
	}

	let exponent = Math.floor(Math.log2(f))
	let mantissa = Math.round((f / 2 ** exponent - 1) * 1024)
	if (mantissa === 1024) {
		mantissa = 0
		exponent++
	}
	return sign | ((exponent + 15) << 10) | mantissa
}
