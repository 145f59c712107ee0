/**
 * Per-format facts: storage size, alpha, block compression and which
 * container versions accept the format
 */

import { VTF_FORMAT, type VtfFormat } from './types'

const FORMAT_ENTRIES: [string, VtfFormat][] = Object.entries(VTF_FORMAT)

const FORMAT_NAMES = new Map<number, string>(FORMAT_ENTRIES.map(([name, value]) => [value, name]))

export function isVtfFormat(value: number): value is VtfFormat {
	return FORMAT_NAMES.has(value)
}

export function formatName(format: number): string {
	return FORMAT_NAMES.get(format) ?? `UNKNOWN(${format})`
}

/**
 * Look up a format by name, case-insensitive ("dxt5", "RGBA8888")
 */
export function parseFormatName(name: string): VtfFormat | undefined {
	const key = name.trim().toUpperCase()
	return FORMAT_ENTRIES.find(([formatKey]) => formatKey === key)?.[1]
}

/**
 * Bytes per 4x4 block, or 0 for formats stored per pixel
 */
export function blockSize(format: number): number {
	switch (format) {
		case VTF_FORMAT.DXT1:
		case VTF_FORMAT.DXT1_ONE_BIT_ALPHA:
		case VTF_FORMAT.ATI1N:
			return 8
		case VTF_FORMAT.DXT3:
		case VTF_FORMAT.DXT5:
		case VTF_FORMAT.ATI2N:
		case VTF_FORMAT.BC7:
		case VTF_FORMAT.BC6H:
			return 16
		default:
			return 0
	}
}

export function isBlockCompressed(format: number): boolean {
	return blockSize(format) > 0
}

/**
 * Bits per pixel for formats stored per pixel
 */
export function bitsPerPixel(format: number): number {
	switch (format) {
		case VTF_FORMAT.EMPTY:
			return 0
		case VTF_FORMAT.I8:
		case VTF_FORMAT.A8:
		case VTF_FORMAT.P8:
		case VTF_FORMAT.R8:
		case VTF_FORMAT.CONSOLE_I8_LINEAR:
			return 8
		case VTF_FORMAT.RGB565:
		case VTF_FORMAT.BGR565:
		case VTF_FORMAT.BGRA4444:
		case VTF_FORMAT.BGRX5551:
		case VTF_FORMAT.BGRA5551:
		case VTF_FORMAT.IA88:
		case VTF_FORMAT.UV88:
		case VTF_FORMAT.R16F:
		case VTF_FORMAT.CONSOLE_BGRX5551_LINEAR:
			return 16
		case VTF_FORMAT.RGB888:
		case VTF_FORMAT.BGR888:
		case VTF_FORMAT.RGB888_BLUESCREEN:
		case VTF_FORMAT.BGR888_BLUESCREEN:
		case VTF_FORMAT.CONSOLE_RGB888_LINEAR:
		case VTF_FORMAT.CONSOLE_BGR888_LINEAR:
			return 24
		case VTF_FORMAT.RGBA16161616F:
		case VTF_FORMAT.RGBA16161616:
		case VTF_FORMAT.RG3232F:
		case VTF_FORMAT.CONSOLE_RGBA16161616_LINEAR:
			return 64
		case VTF_FORMAT.RGB323232F:
			return 96
		case VTF_FORMAT.RGBA32323232F:
			return 128
		default:
			// Every remaining per-pixel format is 32 bits wide
			return 32
	}
}

/**
 * Storage size of one image (one mip of one frame/face/slice)
 */
export function getImageSize(format: number, width: number, height: number): number {
	const block = blockSize(format)
	if (block > 0) {
		return Math.max(1, Math.ceil(width / 4)) * Math.max(1, Math.ceil(height / 4)) * block
	}
	return (width * height * bitsPerPixel(format)) / 8
}

/**
 * Whether the format stores an alpha channel
 */
export function hasAlpha(format: number): boolean {
	switch (format) {
		case VTF_FORMAT.RGBA8888:
		case VTF_FORMAT.ABGR8888:
		case VTF_FORMAT.IA88:
		case VTF_FORMAT.A8:
		case VTF_FORMAT.RGB888_BLUESCREEN:
		case VTF_FORMAT.BGR888_BLUESCREEN:
		case VTF_FORMAT.ARGB8888:
		case VTF_FORMAT.BGRA8888:
		case VTF_FORMAT.DXT3:
		case VTF_FORMAT.DXT5:
		case VTF_FORMAT.BGRA4444:
		case VTF_FORMAT.DXT1_ONE_BIT_ALPHA:
		case VTF_FORMAT.BGRA5551:
		case VTF_FORMAT.UVWQ8888:
		case VTF_FORMAT.RGBA16161616F:
		case VTF_FORMAT.RGBA16161616:
		case VTF_FORMAT.RGBA32323232F:
		case VTF_FORMAT.RGBA1010102:
		case VTF_FORMAT.BGRA1010102:
		case VTF_FORMAT.BC7:
		case VTF_FORMAT.CONSOLE_RGBA8888_LINEAR:
		case VTF_FORMAT.CONSOLE_ABGR8888_LINEAR:
		case VTF_FORMAT.CONSOLE_ARGB8888_LINEAR:
		case VTF_FORMAT.CONSOLE_BGRA8888_LINEAR:
		case VTF_FORMAT.CONSOLE_RGBA16161616_LINEAR:
		case VTF_FORMAT.CONSOLE_BGRA8888_LE:
			return true
		default:
			return false
	}
}

function isConsoleFormat(format: number): boolean {
	return format >= VTF_FORMAT.CONSOLE_BGRX8888_LINEAR && format <= VTF_FORMAT.CONSOLE_BGRA8888_LE
}

/**
 * Lowest 7.x minor version a PC container may carry the format in,
 * or undefined when no version accepts it
 */
export function minimumVersion(format: number): number | undefined {
	if (!isVtfFormat(format)) return undefined
	if (format === VTF_FORMAT.EMPTY || isConsoleFormat(format)) return undefined
	if (format === VTF_FORMAT.R8 || format === VTF_FORMAT.BC7 || format === VTF_FORMAT.BC6H) return 6
	if (format > VTF_FORMAT.UVLX8888) return 4
	return 0
}

export function isFormatSupportedAtVersion(format: number, version: number): boolean {
	const min = minimumVersion(format)
	return min !== undefined && version >= min && version <= 6
}

/**
 * Size of one axis at a mip level
 */
export function mipDimension(size: number, mip: number): number {
	return Math.max(1, size >> mip)
}

/**
 * Full chain length down to 1x1(x1)
 */
export function getMaximumMipCount(width: number, height: number, depth = 1): number {
	const largest = Math.max(width, height, depth)
	if (largest < 1) return 1
	return Math.floor(Math.log2(largest)) + 1
}

/**
 * Mip count to use when generating mips. Block formats stop before the
 * larger side drops under one block; everything else goes down to 1x1.
 */
export function getRecommendedMipCount(format: number, width: number, height: number): number {
	if (!isBlockCompressed(format)) {
		return getMaximumMipCount(width, height)
	}

	let count = 1
	while (Math.max(mipDimension(width, count), mipDimension(height, count)) >= 4) {
		count++
	}
	return count
}
