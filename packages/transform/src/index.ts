/**
 * @vtfkit/transform - Resampling filters and power-of-two sizing
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './resize'
export * from './pow2'
