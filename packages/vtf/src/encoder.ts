/**
 * VTF (Valve Texture Format) encoder
 * Writes a VtfContainer as a 7.0 - 7.6 file, pixel data copied as stored
 */

import { cellsPerMip } from './container'
import { formatName, getImageSize, mipDimension } from './formats'
import {
	VTF_FORMAT_NONE,
	VTF_MAGIC,
	VTF_MAJOR_VERSION,
	VTF_MAX_MINOR_VERSION,
	VTF_RESOURCE,
	type VtfContainer,
} from './types'

/**
 * Header size for a minor version and resource count
 */
export function headerSizeFor(version: number, resourceCount: number): number {
	if (version < 2) return 64
	if (version === 2) return 80
	return 80 + resourceCount * 8
}

/**
 * Encode a container to VTF bytes
 */
export function serializeVtf(container: VtfContainer): Uint8Array {
	const { version, width, height, thumbnail } = container

	if (!Number.isInteger(version) || version < 0 || version > VTF_MAX_MINOR_VERSION) {
		throw new Error(`Cannot write VTF version 7.${version}`)
	}

	let expectedCells = 0
	for (let mip = 0; mip < container.mipCount; mip++) {
		expectedCells += cellsPerMip(container, mip)
	}
	if (container.images.length !== expectedCells) {
		throw new Error(`Container holds ${container.images.length} cells, header describes ${expectedCells}`)
	}

	const levels: Uint8Array[][] = []
	let cursor = 0
	for (let mip = 0; mip < container.mipCount; mip++) {
		const size = getImageSize(container.format, mipDimension(width, mip), mipDimension(height, mip))
		const cells = container.images.slice(cursor, cursor + cellsPerMip(container, mip))
		cursor += cells.length
		for (const cell of cells) {
			if (cell.length !== size) {
				throw new Error(
					`Mip ${mip} cell holds ${cell.length} bytes, ${formatName(container.format)} needs ${size}`
				)
			}
		}
		levels.push(cells)
	}

	const resourceCount = thumbnail ? 2 : 1
	const headerSize = headerSizeFor(version, resourceCount)
	const thumbnailSize = thumbnail ? thumbnail.data.length : 0
	const imageSize = container.images.reduce((sum, cell) => sum + cell.length, 0)

	const output = new Uint8Array(headerSize + thumbnailSize + imageSize)
	const view = new DataView(output.buffer)

	view.setUint32(0, VTF_MAGIC, true)
	view.setUint32(4, VTF_MAJOR_VERSION, true)
	view.setUint32(8, version, true)
	view.setUint32(12, headerSize, true)
	view.setUint16(16, width, true)
	view.setUint16(18, height, true)
	view.setUint32(20, container.flags >>> 0, true)
	view.setUint16(24, container.frameCount, true)
	view.setUint16(26, container.firstFrame, true)
	// Padding (4 bytes at 28)
	view.setFloat32(32, container.reflectivity[0], true)
	view.setFloat32(36, container.reflectivity[1], true)
	view.setFloat32(40, container.reflectivity[2], true)
	// Padding (4 bytes at 44)
	view.setFloat32(48, container.bumpScale, true)
	view.setInt32(52, container.format, true)
	output[56] = container.mipCount
	view.setInt32(57, thumbnail ? thumbnail.format : VTF_FORMAT_NONE, true)
	output[61] = thumbnail ? thumbnail.width : 0
	output[62] = thumbnail ? thumbnail.height : 0
	if (version >= 2) {
		view.setUint16(63, container.depth, true)
	}

	const thumbnailOffset = headerSize
	const imageOffset = headerSize + thumbnailSize

	if (version >= 3) {
		view.setUint32(68, resourceCount, true)
		let entry = 80
		if (thumbnail) {
			writeResource(output, view, entry, VTF_RESOURCE.THUMBNAIL, thumbnailOffset)
			entry += 8
		}
		writeResource(output, view, entry, VTF_RESOURCE.IMAGE, imageOffset)
	}

	if (thumbnail) {
		output.set(thumbnail.data, thumbnailOffset)
	}

	// Smallest mip first
	let offset = imageOffset
	for (let mip = levels.length - 1; mip >= 0; mip--) {
		for (const cell of levels[mip]) {
			output.set(cell, offset)
			offset += cell.length
		}
	}

	return output
}

function writeResource(output: Uint8Array, view: DataView, offset: number, tag: number, data: number): void {
	output[offset] = tag & 0xff
	output[offset + 1] = (tag >> 8) & 0xff
	output[offset + 2] = (tag >> 16) & 0xff
	output[offset + 3] = 0
	view.setUint32(offset + 4, data, true)
}
