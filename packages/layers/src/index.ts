/**
 * @vtfkit/layers - Layered image <-> VTF conversion
 */

export * from './config'
export * from './shape'
export * from './validate'
export * from './planner'
export * from './merge'
export * from './writer'
export * from './reader'
export * from './file'
