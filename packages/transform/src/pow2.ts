/**
 * Power-of-two sizing
 */

import type { Dimensions, PowerOfTwoMethod } from './types'

export function isPowerOfTwo(value: number): boolean {
	return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0
}

/**
 * Round a positive integer to a power of two. Powers of two are returned as is.
 */
export function roundToPowerOfTwo(value: number, method: PowerOfTwoMethod): number {
	if (value <= 1) return 1
	if (isPowerOfTwo(value)) return value

	const lower = 2 ** Math.floor(Math.log2(value))
	const upper = lower * 2

	switch (method) {
		case 'bigger':
			return upper
		case 'smaller':
			return lower
		case 'nearest':
			return value - lower < upper - value ? lower : upper
	}
}

/**
 * Target size for a texture, each axis rounded independently
 */
export function getResizedDims(width: number, height: number, method: PowerOfTwoMethod): Dimensions {
	return {
		width: roundToPowerOfTwo(width, method),
		height: roundToPowerOfTwo(height, method),
	}
}
