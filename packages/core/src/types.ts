/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * One editor layer. Its index in {@link RasterImage.layers} decides which
 * frame or face of the texture it becomes.
 */
export interface Layer {
	readonly name: string
	readonly image: ImageData
}

/**
 * Ordered layer stack with the canvas size shared by every layer
 */
export interface RasterImage {
	readonly width: number
	readonly height: number
	readonly layers: readonly Layer[]
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Editor-style layer name, 1-based and zero padded: "Layer 001"
 */
export function layerName(index: number): string {
	return `Layer ${String(index + 1).padStart(3, '0')}`
}

/**
 * Build a RasterImage from plain images, naming layers by position
 */
export function createRasterImage(images: readonly ImageData[]): RasterImage {
	const first = images[0]
	return {
		width: first ? first.width : 0,
		height: first ? first.height : 0,
		layers: images.map((image, i) => ({ name: layerName(i), image })),
	}
}

/**
 * Whether the buffer length matches width * height * 4
 */
export function hasValidLength(image: ImageData): boolean {
	return image.data.length === image.width * image.height * 4
}
