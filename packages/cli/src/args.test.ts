import { isConversionError } from '@vtfkit/core'
import { parseExportOptions } from '@vtfkit/layers'
import { VTF_FORMAT } from '@vtfkit/vtf'
import { describe, expect, it } from 'vitest'
import { parseArgs, toExportRecord } from './args'

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	throw new Error('Expected an error')
}

describe('parseArgs', () => {
	it('should split command, inputs and options', () => {
		const parsed = parseArgs(['pack', 'a.ff', 'b.ff', '-o', 'out.vtf', '--no-thumbnail', '--bump-scale', '2'])
		expect(parsed).toEqual({
			command: 'pack',
			inputs: ['a.ff', 'b.ff'],
			options: { out: 'out.vtf', thumbnail: false, bumpScale: '2' },
		})
	})

	it('should accept short flags', () => {
		const { options } = parseArgs(['pack', '-f', 'dxt5', '-t', 'envmap', '-m', 'box', '-r', 'nearest', '-v'])
		expect(options).toEqual({ format: 'dxt5', type: 'envmap', mipmaps: 'box', resize: 'nearest', verbose: true })
	})

	it('should leave the command unset for plain flags', () => {
		expect(parseArgs(['--help'])).toEqual({ command: undefined, inputs: [], options: { help: true } })
	})

	it('should treat a lone dash as an input', () => {
		expect(parseArgs(['info', '-']).inputs).toEqual(['-'])
	})

	it('should reject unknown options', () => {
		const err = thrown(() => parseArgs(['pack', '--bogus']))
		expect(isConversionError(err, 'InvalidConfig')).toBe(true)
		expect(err instanceof Error && err.message).toBe('Unknown option: --bogus')
	})

	it('should reject an option without its value', () => {
		const err = thrown(() => parseArgs(['pack', 'a.ff', '-o']))
		expect(err instanceof Error && err.message).toBe('Missing value for -o')
	})

	it('should reject unknown commands', () => {
		const err = thrown(() => parseArgs(['zip', 'a.ff']))
		expect(err instanceof Error && err.message).toBe('Unknown command: zip (expected one of info, unpack, pack)')
	})
})

describe('toExportRecord', () => {
	it('should map flags onto export options', () => {
		const { options } = parseArgs([
			'pack',
			'--vtf-version',
			'7.2',
			'-f',
			'bgr888',
			'-m',
			'none',
			'--no-reflectivity',
			'--merge',
			'--bump-scale',
			'0.5',
		])
		const config = parseExportOptions(toExportRecord(options))

		expect(config.version).toBe(2)
		expect(config.imageFormat).toBe(VTF_FORMAT.BGR888)
		expect(config.mipPolicy).toEqual({ kind: 'none' })
		expect(config.recomputeReflectivity).toBe(false)
		expect(config.mergeLayers).toBe(true)
		expect(config.bumpScale).toBe(0.5)
		expect(config.thumbnailEnabled).toBe(true)
	})

	it('should keep defaults for options not given', () => {
		const config = parseExportOptions(toExportRecord({}))
		expect(config.version).toBe(4)
		expect(config.imageFormat).toBe(VTF_FORMAT.RGBA8888)
		expect(config.resizeMethod).toBe('bigger')
	})
})
