/**
 * @vtfkit/vtf - Valve Texture Format containers
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './formats'
export * from './container'
export { canDecodeFormat, canEncodeFormat, convertImage, decodeToRgba, encodeFromRgba } from './pixels'
export { isVtf, parseVtf } from './decoder'
export { headerSizeFor, serializeVtf } from './encoder'
export { thumbnailDimensions } from './mipmaps'
export type { AlphaUsage } from './analysis'
export { JsVtfCodec, vtfCodec, type VtfCodec } from './codec'
