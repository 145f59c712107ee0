import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createRasterImage, isConversionError, silentLogger } from '@vtfkit/core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createExportConfig } from './config'
import { exportVtf, loadVtf } from './file'

const quiet = { logger: silentLogger }

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	throw new Error('Expected an error')
}

describe('file boundary', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'vtfkit-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it('should write a file that loads back', () => {
		const pixels = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16])
		const image = createRasterImage([{ width: 2, height: 2, data: pixels }])
		const path = join(dir, 'out.vtf')

		const written = exportVtf(image, createExportConfig(), path, quiet)
		const loaded = loadVtf(path, quiet)

		expect(written.warnings).toEqual([])
		expect(loaded.image.layers[0].image.data).toEqual(pixels)
		expect(loaded.info.version).toBe(4)
	})

	it('should report a missing file as a read error', () => {
		const err = thrown(() => loadVtf(join(dir, 'missing.vtf'), quiet))
		expect(isConversionError(err, 'ReadError')).toBe(true)
	})

	it('should report an unwritable path as a serialization error', () => {
		const image = createRasterImage([{ width: 1, height: 1, data: new Uint8Array(4) }])
		const err = thrown(() => exportVtf(image, createExportConfig(), join(dir, 'no-such-dir', 'out.vtf'), quiet))
		expect(isConversionError(err, 'SerializationError')).toBe(true)
	})

	it('should not write anything when validation fails', () => {
		const image = createRasterImage([{ width: 1, height: 1, data: new Uint8Array(4) }])
		const path = join(dir, 'sphere.vtf')
		const config = createExportConfig({ imageType: 'envmap' })

		expect(isConversionError(thrown(() => exportVtf(image, config, path, quiet)), 'ShapeMismatch')).toBe(true)
		expect(existsSync(path)).toBe(false)
	})
})
