/**
 * VTF (Valve Texture Format) types
 * Used in Source engine games (Half-Life 2, Portal, CS:GO, etc.)
 */

// VTF magic number "VTF\0"
export const VTF_MAGIC = 0x00465456

export const VTF_MAJOR_VERSION = 7
export const VTF_MAX_MINOR_VERSION = 6

// Image formats
export const VTF_FORMAT = {
	RGBA8888: 0,
	ABGR8888: 1,
	RGB888: 2,
	BGR888: 3,
	RGB565: 4,
	I8: 5, // Luminance
	IA88: 6, // Luminance + Alpha
	P8: 7, // Paletted
	A8: 8,
	RGB888_BLUESCREEN: 9,
	BGR888_BLUESCREEN: 10,
	ARGB8888: 11,
	BGRA8888: 12,
	DXT1: 13,
	DXT3: 14,
	DXT5: 15,
	BGRX8888: 16,
	BGR565: 17,
	BGRX5551: 18,
	BGRA4444: 19,
	DXT1_ONE_BIT_ALPHA: 20,
	BGRA5551: 21,
	UV88: 22,
	UVWQ8888: 23,
	RGBA16161616F: 24,
	RGBA16161616: 25,
	UVLX8888: 26,
	R32F: 27,
	RGB323232F: 28,
	RGBA32323232F: 29,
	RG1616F: 30,
	RG3232F: 31,
	RGBX8888: 32,
	EMPTY: 33,
	ATI2N: 34,
	ATI1N: 35,
	RGBA1010102: 36,
	BGRA1010102: 37,
	R16F: 38,
	CONSOLE_BGRX8888_LINEAR: 42,
	CONSOLE_RGBA8888_LINEAR: 43,
	CONSOLE_ABGR8888_LINEAR: 44,
	CONSOLE_ARGB8888_LINEAR: 45,
	CONSOLE_BGRA8888_LINEAR: 46,
	CONSOLE_RGB888_LINEAR: 47,
	CONSOLE_BGR888_LINEAR: 48,
	CONSOLE_BGRX5551_LINEAR: 49,
	CONSOLE_I8_LINEAR: 50,
	CONSOLE_RGBA16161616_LINEAR: 51,
	CONSOLE_BGRX8888_LE: 52,
	CONSOLE_BGRA8888_LE: 53,
	R8: 69,
	BC7: 70,
	BC6H: 71,
} as const

export type VtfFormatName = keyof typeof VTF_FORMAT
export type VtfFormat = (typeof VTF_FORMAT)[VtfFormatName]

// Low-res format value meaning "no thumbnail"
export const VTF_FORMAT_NONE = -1

// Header flags (subset used by the exporter, plus the common engine ones)
export const VTF_FLAG = {
	POINT_SAMPLE: 0x1,
	TRILINEAR: 0x2,
	CLAMP_S: 0x4,
	CLAMP_T: 0x8,
	ANISOTROPIC: 0x10,
	HINT_DXT5: 0x20,
	SRGB: 0x40,
	NORMAL: 0x80,
	NO_MIP: 0x100,
	NO_LOD: 0x200,
	LOAD_ALL_MIPS: 0x400,
	PROCEDURAL: 0x800,
	ONE_BIT_ALPHA: 0x1000,
	MULTI_BIT_ALPHA: 0x2000,
	ENVMAP: 0x4000,
	RENDERTARGET: 0x8000,
	DEPTH_RENDERTARGET: 0x10000,
	NO_DEBUG_OVERRIDE: 0x20000,
	SINGLE_COPY: 0x40000,
} as const

// firstFrame value marking a cube map without the trailing sphere map face
export const VTF_NO_SPHERE_MAP = 0xffff

export const VTF_CUBE_FACES = 6
export const VTF_CUBE_FACES_WITH_SPHERE = 7

// Resource tags (first 3 bytes of a 7.3+ resource entry)
export const VTF_RESOURCE = {
	THUMBNAIL: 0x01,
	IMAGE: 0x30,
} as const

// Resource entry flag: the 4 data bytes hold the value itself
export const VTF_RESOURCE_NO_DATA_CHUNK = 0x02

// "AXC" resource (7.6): auxiliary compression info
export const VTF_RESOURCE_AUX_COMPRESSION = 0x435841

export const VTF_THUMBNAIL_SIZE = 16

export const VTF_DEFAULT_REFLECTIVITY: readonly [number, number, number] = [0.5, 0.5, 0.5]
export const VTF_DEFAULT_BUMP_SCALE = 1

export interface VtfThumbnail {
	format: VtfFormat
	width: number
	height: number
	data: Uint8Array
}

/**
 * In-memory VTF. `images` holds one buffer per (mip, frame, face, slice)
 * cell, encoded in `format`; see {@link cellIndex} for the ordering.
 */
export interface VtfContainer {
	/** Minor version, 7.x */
	version: number
	width: number
	height: number
	depth: number
	mipCount: number
	frameCount: number
	faceCount: number
	firstFrame: number
	format: VtfFormat
	flags: number
	thumbnail?: VtfThumbnail
	reflectivity: [number, number, number]
	bumpScale: number
	images: Uint8Array[]
}

export interface VtfCreationOptions {
	version: number
	frameCount?: number
	faceCount?: number
	depth?: number
	flags?: number
}
