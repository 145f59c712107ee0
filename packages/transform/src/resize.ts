/**
 * Image resize operations
 * Separable resampling with box, tent, cubic and windowed-sinc kernels
 */

import type { ImageData } from '@vtfkit/core'
import type { ResizeFilter } from './types'

interface Kernel {
	/** Half width of the kernel at scale 1 */
	readonly support: number
	weight(x: number): number
}

/**
 * Source taps for one destination pixel along an axis
 */
interface Contribution {
	readonly start: number
	readonly weights: Float64Array
}

const BOX: Kernel = {
	support: 0.5,
	weight: (x) => (x >= -0.5 && x < 0.5 ? 1 : 0),
}

const TENT: Kernel = {
	support: 1,
	weight: (x) => {
		const ax = Math.abs(x)
		return ax < 1 ? 1 - ax : 0
	},
}

const B_SPLINE = cubicKernel(1, 0)
const CATMULL_ROM = cubicKernel(0, 0.5)
const MITCHELL = cubicKernel(1 / 3, 1 / 3)
const KAISER = kaiserKernel(3, 4)

/**
 * Resize image to new dimensions
 */
export function resize(
	image: ImageData,
	newWidth: number,
	newHeight: number,
	filter: ResizeFilter = 'default'
): ImageData {
	const { width, height, data } = image

	if (newWidth === width && newHeight === height) {
		return { width, height, data: new Uint8Array(data) }
	}

	if (filter === 'point') {
		return resizeNearest(image, newWidth, newHeight)
	}

	const kernelX = pickKernel(filter, width, newWidth)
	const kernelY = pickKernel(filter, height, newHeight)
	const columns = computeContributions(width, newWidth, kernelX)
	const rows = computeContributions(height, newHeight, kernelY)

	// Horizontal pass: height x newWidth, kept in floating point
	const temp = new Float32Array(newWidth * height * 4)
	for (let y = 0; y < height; y++) {
		const srcRow = y * width * 4
		const dstRow = y * newWidth * 4
		for (let x = 0; x < newWidth; x++) {
			const { start, weights } = columns[x]
			for (let c = 0; c < 4; c++) {
				let sum = 0
				for (let k = 0; k < weights.length; k++) {
					sum += data[srcRow + (start + k) * 4 + c] * weights[k]
				}
				temp[dstRow + x * 4 + c] = sum
			}
		}
	}

	// Vertical pass
	const output = new Uint8Array(newWidth * newHeight * 4)
	for (let y = 0; y < newHeight; y++) {
		const { start, weights } = rows[y]
		const dstRow = y * newWidth * 4
		for (let x = 0; x < newWidth; x++) {
			for (let c = 0; c < 4; c++) {
				let sum = 0
				for (let k = 0; k < weights.length; k++) {
					sum += temp[((start + k) * newWidth + x) * 4 + c] * weights[k]
				}
				output[dstRow + x * 4 + c] = clamp(Math.round(sum), 0, 255)
			}
		}
	}

	return { width: newWidth, height: newHeight, data: output }
}

/**
 * Half-size a level the way mip chains step down, never below 1x1
 */
export function downsample(image: ImageData, filter: ResizeFilter = 'default'): ImageData {
	return resize(image, Math.max(1, image.width >> 1), Math.max(1, image.height >> 1), filter)
}

/**
 * Nearest neighbor interpolation (fastest, pixelated)
 */
function resizeNearest(image: ImageData, dstW: number, dstH: number): ImageData {
	const { width: srcW, height: srcH, data: src } = image
	const dst = new Uint8Array(dstW * dstH * 4)
	const scaleX = srcW / dstW
	const scaleY = srcH / dstH

	for (let y = 0; y < dstH; y++) {
		const srcY = Math.min(srcH - 1, Math.floor((y + 0.5) * scaleY))
		for (let x = 0; x < dstW; x++) {
			const srcX = Math.min(srcW - 1, Math.floor((x + 0.5) * scaleX))
			const srcIdx = (srcY * srcW + srcX) * 4
			const dstIdx = (y * dstW + x) * 4

			dst[dstIdx] = src[srcIdx]
			dst[dstIdx + 1] = src[srcIdx + 1]
			dst[dstIdx + 2] = src[srcIdx + 2]
			dst[dstIdx + 3] = src[srcIdx + 3]
		}
	}

	return { width: dstW, height: dstH, data: dst }
}

function pickKernel(filter: Exclude<ResizeFilter, 'point'>, srcSize: number, dstSize: number): Kernel {
	switch (filter) {
		case 'default':
			return dstSize < srcSize ? MITCHELL : CATMULL_ROM
		case 'box':
			return BOX
		case 'bilinear':
			return TENT
		case 'cubic':
			return B_SPLINE
		case 'catmull':
			return CATMULL_ROM
		case 'mitchell':
			return MITCHELL
		case 'kaiser':
			return KAISER
	}
}

/**
 * Per destination pixel source taps, clamped at the edges and normalized to 1
 */
function computeContributions(srcSize: number, dstSize: number, kernel: Kernel): Contribution[] {
	const scale = srcSize / dstSize
	// Widen the kernel when shrinking so every source pixel contributes
	const filterScale = Math.max(1, scale)
	const radius = kernel.support * filterScale
	const result: Contribution[] = []

	for (let d = 0; d < dstSize; d++) {
		const center = (d + 0.5) * scale - 0.5
		const first = Math.ceil(center - radius)
		const last = Math.floor(center + radius)

		const start = clamp(first, 0, srcSize - 1)
		const end = clamp(last, 0, srcSize - 1)
		const weights = new Float64Array(end - start + 1)
		let total = 0

		for (let s = first; s <= last; s++) {
			const w = kernel.weight((s - center) / filterScale)
			if (w === 0) continue
			weights[clamp(s, 0, srcSize - 1) - start] += w
			total += w
		}

		if (total === 0) {
			// Degenerate kernel footprint: fall back to the nearest source pixel
			weights.fill(0)
			weights[clamp(Math.round(center), start, end) - start] = 1
		} else {
			for (let k = 0; k < weights.length; k++) weights[k] /= total
		}

		result.push({ start, weights })
	}

	return result
}

/**
 * Mitchell-Netravali family of cubic filters
 */
function cubicKernel(b: number, c: number): Kernel {
	return {
		support: 2,
		weight: (x) => {
			const ax = Math.abs(x)
			if (ax < 1) {
				return (
					((12 - 9 * b - 6 * c) * ax * ax * ax + (-18 + 12 * b + 6 * c) * ax * ax + (6 - 2 * b)) /
					6
				)
			}
			if (ax < 2) {
				return (
					((-b - 6 * c) * ax * ax * ax +
						(6 * b + 30 * c) * ax * ax +
						(-12 * b - 48 * c) * ax +
						(8 * b + 24 * c)) /
					6
				)
			}
			return 0
		},
	}
}

/**
 * Sinc windowed by a Kaiser window
 */
function kaiserKernel(support: number, alpha: number): Kernel {
	const denom = besselI0(alpha)
	return {
		support,
		weight: (x) => {
			const ax = Math.abs(x)
			if (ax >= support) return 0
			const t = ax / support
			return (sinc(ax) * besselI0(alpha * Math.sqrt(1 - t * t))) / denom
		},
	}
}

function sinc(x: number): number {
	if (x === 0) return 1
	const pix = Math.PI * x
	return Math.sin(pix) / pix
}

/**
 * Zeroth order modified Bessel function of the first kind (power series)
 */
function besselI0(x: number): number {
	let sum = 1
	let term = 1
	const halfX = x / 2
	for (let k = 1; k < 32; k++) {
		term *= (halfX / k) * (halfX / k)
		sum += term
		if (term < sum * 1e-12) break
	}
	return sum
}

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}
