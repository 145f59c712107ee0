/**
 * Pixel analysis over mip 0: reflectivity and alpha usage
 */

import { forEachCell } from './container'
import { readCell } from './mipmaps'
import { VTF_FLAG, type VtfContainer } from './types'

const GAMMA = 2.2

// (c / 255) ^ 2.2 for every byte value
const LINEAR = Float64Array.from({ length: 256 }, (_, c) => (c / 255) ** GAMMA)

/**
 * Mean linear color over every mip 0 pixel of every frame, face and slice
 */
export function measureReflectivity(container: VtfContainer): [number, number, number] {
	let r = 0
	let g = 0
	let b = 0
	let count = 0

	forEachCell(container, 0, (frame, face, slice) => {
		const { data } = readCell(container, 0, frame, face, slice)
		for (let i = 0; i < data.length; i += 4) {
			r += LINEAR[data[i]]
			g += LINEAR[data[i + 1]]
			b += LINEAR[data[i + 2]]
		}
		count += data.length / 4
	})

	if (count === 0) return [0, 0, 0]
	return [r / count, g / count, b / count]
}

export type AlphaUsage = 'opaque' | 'binary' | 'graded'

/**
 * How mip 0 uses alpha: never below 255, only 0 and 255, or anything else
 */
export function measureAlphaUsage(container: VtfContainer): AlphaUsage {
	let usage: AlphaUsage = 'opaque'

	forEachCell(container, 0, (frame, face, slice) => {
		if (usage === 'graded') return
		const { data } = readCell(container, 0, frame, face, slice)
		for (let i = 3; i < data.length; i += 4) {
			const alpha = data[i]
			if (alpha === 255) continue
			if (alpha !== 0) {
				usage = 'graded'
				return
			}
			usage = 'binary'
		}
	})

	return usage
}

/**
 * Flags with ONE_BIT_ALPHA / MULTI_BIT_ALPHA set to match the pixels
 */
export function transparencyFlags(flags: number, usage: AlphaUsage): number {
	const cleared = flags & ~(VTF_FLAG.ONE_BIT_ALPHA | VTF_FLAG.MULTI_BIT_ALPHA)
	switch (usage) {
		case 'opaque':
			return cleared
		case 'binary':
			return cleared | VTF_FLAG.ONE_BIT_ALPHA
		case 'graded':
			return cleared | VTF_FLAG.MULTI_BIT_ALPHA
	}
}
