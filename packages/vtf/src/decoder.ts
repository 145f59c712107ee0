/**
 * VTF (Valve Texture Format) container parser
 * Reads versions 7.0 - 7.6: header, resource directory, thumbnail and the
 * full mip x frame x face x slice grid. Pixel data stays in its stored format.
 */

import { ConversionError } from '@vtfkit/core'
import { cellsPerMip } from './container'
import { getImageSize, getMaximumMipCount, isVtfFormat, mipDimension } from './formats'
import {
	VTF_CUBE_FACES,
	VTF_CUBE_FACES_WITH_SPHERE,
	VTF_FLAG,
	VTF_FORMAT_NONE,
	VTF_MAGIC,
	VTF_MAJOR_VERSION,
	VTF_MAX_MINOR_VERSION,
	VTF_NO_SPHERE_MAP,
	VTF_RESOURCE,
	VTF_RESOURCE_AUX_COMPRESSION,
	VTF_RESOURCE_NO_DATA_CHUNK,
	type VtfContainer,
	type VtfFormat,
	type VtfThumbnail,
} from './types'

// Bytes read from the fixed header of every version
const BASE_HEADER_SIZE = 64
// 7.2 adds depth; 7.3 adds the resource directory starting here
const RESOURCE_DIRECTORY_OFFSET = 80

interface ResourceEntry {
	tag: number
	flags: number
	data: number
}

/**
 * Check for the "VTF\0" signature
 */
export function isVtf(data: Uint8Array): boolean {
	if (data.length < 4) return false
	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	return view.getUint32(0, true) === VTF_MAGIC
}

/**
 * Parse a VTF file. Malformed input throws a ConversionError of kind ParseError.
 */
export function parseVtf(data: Uint8Array): VtfContainer {
	if (data.length < BASE_HEADER_SIZE) {
		throw parseError(`File too small for a VTF header (${data.length} bytes)`)
	}
	if (!isVtf(data)) {
		throw parseError('Invalid VTF: wrong signature')
	}

	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

	const major = view.getUint32(4, true)
	const version = view.getUint32(8, true)
	if (major !== VTF_MAJOR_VERSION || version > VTF_MAX_MINOR_VERSION) {
		throw parseError(`Unsupported VTF version ${major}.${version}`)
	}

	const headerSize = view.getUint32(12, true)
	const width = view.getUint16(16, true)
	const height = view.getUint16(18, true)
	const flags = view.getUint32(20, true)
	const frameCount = view.getUint16(24, true)
	const firstFrame = view.getUint16(26, true)
	const reflectivity: [number, number, number] = [
		view.getFloat32(32, true),
		view.getFloat32(36, true),
		view.getFloat32(40, true),
	]
	const bumpScale = view.getFloat32(48, true)
	const format = view.getInt32(52, true)
	const mipCount = data[56]
	const lowResFormat = view.getInt32(57, true)
	const lowResWidth = data[61]
	const lowResHeight = data[62]
	// Older files may store 0 here
	const depth = version >= 2 && data.length >= 65 ? Math.max(1, view.getUint16(63, true)) : 1

	if (width === 0 || height === 0) {
		throw parseError(`Invalid VTF dimensions ${width}x${height}`)
	}
	if (frameCount === 0) {
		throw parseError('Invalid VTF: zero frames')
	}
	if (!isVtfFormat(format)) {
		throw parseError(`Unknown VTF image format ${format}`)
	}
	const maxMips = getMaximumMipCount(width, height, depth)
	if (mipCount < 1 || mipCount > maxMips) {
		throw parseError(`Invalid mip count ${mipCount} for ${width}x${height}`)
	}
	if (headerSize < BASE_HEADER_SIZE || headerSize > data.length) {
		throw parseError(`Invalid header size ${headerSize}`)
	}

	let faceCount = 1
	if (flags & VTF_FLAG.ENVMAP) {
		// Sphere maps were only written by 7.1 - 7.4
		faceCount =
			version >= 1 && version <= 4 && firstFrame !== VTF_NO_SPHERE_MAP
				? VTF_CUBE_FACES_WITH_SPHERE
				: VTF_CUBE_FACES
	}

	const container: VtfContainer = {
		version,
		width,
		height,
		depth,
		mipCount,
		frameCount,
		faceCount,
		firstFrame,
		format,
		flags,
		reflectivity,
		bumpScale,
		images: [],
	}

	let thumbnailFormat: VtfFormat | undefined
	if (lowResFormat !== VTF_FORMAT_NONE && lowResWidth > 0 && lowResHeight > 0) {
		if (!isVtfFormat(lowResFormat)) {
			throw parseError(`Unknown VTF thumbnail format ${lowResFormat}`)
		}
		thumbnailFormat = lowResFormat
	}

	let thumbnailOffset: number | undefined
	let imageOffset: number | undefined

	if (version >= 3) {
		for (const entry of readResources(view, headerSize)) {
			switch (entry.tag) {
				case VTF_RESOURCE.THUMBNAIL:
					thumbnailOffset = entry.data
					break
				case VTF_RESOURCE.IMAGE:
					imageOffset = entry.data
					break
				case VTF_RESOURCE_AUX_COMPRESSION:
					if (auxCompressionLevel(data, view, entry) !== 0) {
						throw parseError('Compressed VTF image data is not supported')
					}
					break
			}
		}
		if (imageOffset === undefined) {
			throw parseError('VTF has no image data resource')
		}
	} else {
		thumbnailOffset = headerSize
		imageOffset = headerSize + (thumbnailFormat === undefined ? 0 : getImageSize(thumbnailFormat, lowResWidth, lowResHeight))
	}

	if (thumbnailFormat !== undefined && thumbnailOffset !== undefined) {
		container.thumbnail = readThumbnail(data, thumbnailOffset, thumbnailFormat, lowResWidth, lowResHeight)
	}

	container.images = readImages(data, imageOffset, container)
	return container
}

function readResources(view: DataView, headerSize: number): ResourceEntry[] {
	if (view.byteLength < RESOURCE_DIRECTORY_OFFSET) {
		throw parseError('Truncated VTF header')
	}
	const count = view.getUint32(68, true)
	const end = RESOURCE_DIRECTORY_OFFSET + count * 8
	if (end > headerSize) {
		throw parseError(`Resource directory (${count} entries) exceeds header size ${headerSize}`)
	}

	const entries: ResourceEntry[] = []
	for (let i = 0; i < count; i++) {
		const offset = RESOURCE_DIRECTORY_OFFSET + i * 8
		const tag =
			view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getUint8(offset + 2) << 16)
		entries.push({
			tag,
			flags: view.getUint8(offset + 3),
			data: view.getUint32(offset + 4, true),
		})
	}
	return entries
}

/**
 * Deflate level from an AXC resource, 0 when the data is stored raw
 */
function auxCompressionLevel(data: Uint8Array, view: DataView, entry: ResourceEntry): number {
	if (entry.flags & VTF_RESOURCE_NO_DATA_CHUNK) {
		return entry.data
	}
	// Chunk: u32 length, then the level
	if (entry.data + 8 > data.length) {
		throw parseError('Truncated auxiliary compression resource')
	}
	const length = view.getUint32(entry.data, true)
	return length >= 4 ? view.getUint32(entry.data + 4, true) : 0
}

function readThumbnail(
	data: Uint8Array,
	offset: number,
	format: VtfFormat,
	width: number,
	height: number
): VtfThumbnail {
	const size = getImageSize(format, width, height)
	if (offset + size > data.length) {
		throw parseError('Truncated VTF thumbnail')
	}
	return { format, width, height, data: data.slice(offset, offset + size) }
}

/**
 * Image data is stored smallest mip first; the result is indexed mip 0 first
 */
function readImages(data: Uint8Array, start: number, container: VtfContainer): Uint8Array[] {
	const levels: Uint8Array[][] = []
	let offset = start
	for (let mip = container.mipCount - 1; mip >= 0; mip--) {
		const size = getImageSize(
			container.format,
			mipDimension(container.width, mip),
			mipDimension(container.height, mip)
		)
		const cells = cellsPerMip(container, mip)
		if (offset + size * cells > data.length) {
			throw parseError(`Truncated VTF image data at mip ${mip}`)
		}
		const level: Uint8Array[] = []
		for (let i = 0; i < cells; i++) {
			level.push(data.slice(offset, offset + size))
			offset += size
		}
		levels[mip] = level
	}

	return levels.flat()
}

function parseError(message: string): ConversionError {
	return new ConversionError('ParseError', message)
}
