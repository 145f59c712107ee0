/**
 * @vtfkit/core - Raster data model, conversion errors and logging
 */

export * from './types'
export * from './errors'
export * from './logger'
