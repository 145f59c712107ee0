/**
 * File boundary: read all bytes / write all bytes
 */

import { readFileSync, writeFileSync } from 'node:fs'
import { ConversionError, errorMessage, type RasterImage } from '@vtfkit/core'
import type { ExportConfig } from './config'
import { decodeLayers, type DecodeResult } from './reader'
import { encodeLayers, type EncodeResult, type PipelineOptions } from './writer'

/**
 * Load a VTF file as layers. Read failures are ReadError.
 */
export function loadVtf(path: string, options: PipelineOptions = {}): DecodeResult {
	let data: Uint8Array
	try {
		data = new Uint8Array(readFileSync(path))
	} catch (err) {
		throw new ConversionError('ReadError', `Cannot read ${path}: ${errorMessage(err)}`, { cause: err })
	}
	return decodeLayers(data, options)
}

/**
 * Encode in memory, then write the whole file. Nothing is written when
 * encoding fails; write failures are SerializationError.
 */
export function exportVtf(
	image: RasterImage,
	config: ExportConfig,
	path: string,
	options: PipelineOptions = {}
): EncodeResult {
	const result = encodeLayers(image, config, options)
	try {
		writeFileSync(path, result.data)
	} catch (err) {
		throw new ConversionError('SerializationError', `Cannot write ${path}: ${errorMessage(err)}`, {
			cause: err,
			warnings: result.warnings,
		})
	}
	return result
}
