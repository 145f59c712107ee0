/**
 * Block-compressed format decoders (DXT1/3/5, ATI1N, ATI2N) to RGBA8888
 */

type Rgb = [number, number, number]

export function decodeDXT1(src: Uint8Array, width: number, height: number, oneBitAlpha: boolean): Uint8Array {
	const dst = new Uint8Array(width * height * 4)
	const view = new DataView(src.buffer, src.byteOffset, src.byteLength)
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)

	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			const blockIdx = (by * blocksX + bx) * 8
			const palette = colorPalette(view, blockIdx, true)
			const transparentBlack = view.getUint16(blockIdx, true) <= view.getUint16(blockIdx + 2, true)
			const indices = view.getUint32(blockIdx + 4, true)

			forEachTexel(bx, by, width, height, (texel, dstPos) => {
				const colorIdx = (indices >> (texel * 2)) & 3
				const color = palette[colorIdx]
				dst[dstPos] = color[0]
				dst[dstPos + 1] = color[1]
				dst[dstPos + 2] = color[2]
				dst[dstPos + 3] = oneBitAlpha && transparentBlack && colorIdx === 3 ? 0 : 255
			})
		}
	}

	return dst
}

export function decodeDXT3(src: Uint8Array, width: number, height: number): Uint8Array {
	const dst = new Uint8Array(width * height * 4)
	const view = new DataView(src.buffer, src.byteOffset, src.byteLength)
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)

	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			const blockIdx = (by * blocksX + bx) * 16
			const palette = colorPalette(view, blockIdx + 8, false)
			const indices = view.getUint32(blockIdx + 12, true)

			forEachTexel(bx, by, width, height, (texel, dstPos) => {
				const color = palette[(indices >> (texel * 2)) & 3]
				// 4-bit explicit alpha, two texels per byte, low nibble first
				const alphaByte = src[blockIdx + (texel >> 1)]
				const alpha4 = texel & 1 ? alphaByte >> 4 : alphaByte & 0x0f
				dst[dstPos] = color[0]
				dst[dstPos + 1] = color[1]
				dst[dstPos + 2] = color[2]
				dst[dstPos + 3] = alpha4 * 17
			})
		}
	}

	return dst
}

export function decodeDXT5(src: Uint8Array, width: number, height: number): Uint8Array {
	const dst = new Uint8Array(width * height * 4)
	const view = new DataView(src.buffer, src.byteOffset, src.byteLength)
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)

	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			const blockIdx = (by * blocksX + bx) * 16
			const alphas = decodeChannelBlock(src, blockIdx)
			const palette = colorPalette(view, blockIdx + 8, false)
			const indices = view.getUint32(blockIdx + 12, true)

			forEachTexel(bx, by, width, height, (texel, dstPos) => {
				const color = palette[(indices >> (texel * 2)) & 3]
				dst[dstPos] = color[0]
				dst[dstPos + 1] = color[1]
				dst[dstPos + 2] = color[2]
				dst[dstPos + 3] = alphas[texel]
			})
		}
	}

	return dst
}

/**
 * ATI1N (BC4): one channel, decoded into red
 */
export function decodeATI1N(src: Uint8Array, width: number, height: number): Uint8Array {
	const dst = new Uint8Array(width * height * 4)
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)

	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			const values = decodeChannelBlock(src, (by * blocksX + bx) * 8)
			forEachTexel(bx, by, width, height, (texel, dstPos) => {
				dst[dstPos] = values[texel]
				dst[dstPos + 3] = 255
			})
		}
	}

	return dst
}

/**
 * ATI2N (BC5): two channels, decoded into red and green
 */
export function decodeATI2N(src: Uint8Array, width: number, height: number): Uint8Array {
	const dst = new Uint8Array(width * height * 4)
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)

	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			const blockIdx = (by * blocksX + bx) * 16
			const red = decodeChannelBlock(src, blockIdx)
			const green = decodeChannelBlock(src, blockIdx + 8)
			forEachTexel(bx, by, width, height, (texel, dstPos) => {
				dst[dstPos] = red[texel]
				dst[dstPos + 1] = green[texel]
				dst[dstPos + 3] = 255
			})
		}
	}

	return dst
}

function forEachTexel(
	bx: number,
	by: number,
	width: number,
	height: number,
	fn: (texel: number, dstPos: number) => void
): void {
	for (let py = 0; py < 4; py++) {
		for (let px = 0; px < 4; px++) {
			const x = bx * 4 + px
			const y = by * 4 + py
			if (x < width && y < height) {
				fn(py * 4 + px, (y * width + x) * 4)
			}
		}
	}
}

/**
 * Four-entry color palette of a DXT color block. DXT1 switches to
 * three colors + black when c0 <= c1; DXT3/5 always interpolate.
 */
function colorPalette(view: DataView, offset: number, allowThreeColor: boolean): Rgb[] {
	const c0 = view.getUint16(offset, true)
	const c1 = view.getUint16(offset + 2, true)
	const a = rgb565ToRgb888(c0)
	const b = rgb565ToRgb888(c1)

	if (c0 > c1 || !allowThreeColor) {
		return [a, b, mix(a, b, 2, 1), mix(a, b, 1, 2)]
	}
	return [a, b, mix(a, b, 1, 1), [0, 0, 0]]
}

function mix(a: Rgb, b: Rgb, wa: number, wb: number): Rgb {
	const total = wa + wb
	return [
		Math.round((wa * a[0] + wb * b[0]) / total),
		Math.round((wa * a[1] + wb * b[1]) / total),
		Math.round((wa * a[2] + wb * b[2]) / total),
	]
}

/**
 * 8-byte interpolated channel block shared by DXT5 alpha, ATI1N and ATI2N
 */
function decodeChannelBlock(src: Uint8Array, offset: number): number[] {
	const v0 = src[offset]
	const v1 = src[offset + 1]
	let bits = 0n
	for (let i = 0; i < 6; i++) {
		bits |= BigInt(src[offset + 2 + i]) << BigInt(i * 8)
	}

	const levels: number[] = [v0, v1, 0, 0, 0, 0, 0, 0]
	if (v0 > v1) {
		for (let i = 2; i < 8; i++) {
			levels[i] = Math.round(((8 - i) * v0 + (i - 1) * v1) / 7)
		}
	} else {
		for (let i = 2; i < 6; i++) {
			levels[i] = Math.round(((6 - i) * v0 + (i - 1) * v1) / 5)
		}
		levels[6] = 0
		levels[7] = 255
	}

	const values: number[] = []
	for (let texel = 0; texel < 16; texel++) {
		values.push(levels[Number((bits >> BigInt(texel * 3)) & 7n)])
	}
	return values
}

function rgb565ToRgb888(c: number): Rgb {
	const r = ((c >> 11) & 0x1f) << 3
	const g = ((c >> 5) & 0x3f) << 2
	const b = (c & 0x1f) << 3
	return [r | (r >> 5), g | (g >> 6), b | (b >> 5)]
}
