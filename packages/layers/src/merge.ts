/**
 * Layer flattening for single-image export
 */

import { layerName, type ImageData, type RasterImage } from '@vtfkit/core'

/**
 * Composite every layer over the ones before it (layer 0 is the bottom)
 * with normal blending. Returns a one-layer image.
 */
export function mergeLayers(image: RasterImage): RasterImage {
	const { width, height } = image
	// Start with transparent background
	const output = new Uint8Array(width * height * 4)

	for (const layer of image.layers) {
		compositeOver(output, layer.image)
	}

	const merged: ImageData = { width, height, data: output }
	return { width, height, layers: [{ name: layerName(0), image: merged }] }
}

function compositeOver(output: Uint8Array, image: ImageData): void {
	const pixels = Math.min(output.length, image.data.length) >> 2

	for (let i = 0; i < pixels; i++) {
		const idx = i * 4
		const alpha = image.data[idx + 3] / 255
		if (alpha === 0) continue

		const baseA = output[idx + 3] / 255
		// Porter-Duff over
		const outA = alpha + baseA * (1 - alpha)
		const baseContrib = baseA * (1 - alpha)
		for (let c = 0; c < 3; c++) {
			output[idx + c] = Math.round((image.data[idx + c] * alpha + output[idx + c] * baseContrib) / outA)
		}
		output[idx + 3] = Math.round(outA * 255)
	}
}
