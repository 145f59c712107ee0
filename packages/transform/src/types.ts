/**
 * Transform types and options
 */

/**
 * Resampling kernel used for mip levels, thumbnails and power-of-two resizing.
 * 'default' picks Mitchell when shrinking and Catmull-Rom when enlarging.
 */
export type ResizeFilter =
	| 'default'
	| 'box'
	| 'bilinear'
	| 'cubic'
	| 'catmull'
	| 'mitchell'
	| 'point'
	| 'kaiser'

export const RESIZE_FILTERS: readonly ResizeFilter[] = [
	'default',
	'box',
	'bilinear',
	'cubic',
	'catmull',
	'mitchell',
	'point',
	'kaiser',
]

/**
 * How a dimension that is not a power of two is rounded
 * - bigger: smallest power of two >= value
 * - smaller: largest power of two <= value
 * - nearest: closest power of two, ties round up
 */
export type PowerOfTwoMethod = 'bigger' | 'smaller' | 'nearest'

export const POWER_OF_TWO_METHODS: readonly PowerOfTwoMethod[] = ['bigger', 'smaller', 'nearest']

export interface Dimensions {
	width: number
	height: number
}
