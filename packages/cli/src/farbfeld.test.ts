import { isConversionError } from '@vtfkit/core'
import { describe, expect, it } from 'vitest'
import { decodeFarbfeld, encodeFarbfeld, isFarbfeld } from './farbfeld'

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	throw new Error('Expected an error')
}

describe('farbfeld', () => {
	const image = {
		width: 2,
		height: 1,
		data: new Uint8Array([255, 128, 0, 255, 1, 2, 3, 4]),
	}

	it('should write the header', () => {
		const ff = encodeFarbfeld(image)
		const view = new DataView(ff.buffer)

		expect(new TextDecoder().decode(ff.subarray(0, 8))).toBe('farbfeld')
		expect(view.getUint32(8, false)).toBe(2)
		expect(view.getUint32(12, false)).toBe(1)
		expect(ff.length).toBe(16 + 2 * 8)
	})

	it('should widen channels to 16 bits', () => {
		const view = new DataView(encodeFarbfeld(image).buffer)
		expect(view.getUint16(16, false)).toBe(0xffff)
		expect(view.getUint16(18, false)).toBe(0x8080)
		expect(view.getUint16(20, false)).toBe(0)
		expect(view.getUint16(30, false)).toBe(0x0404)
	})

	it('should read back what it writes', () => {
		const decoded = decodeFarbfeld(encodeFarbfeld(image))
		expect(decoded.width).toBe(2)
		expect(decoded.height).toBe(1)
		expect(decoded.data).toEqual(image.data)
	})

	it('should keep the high byte of 16-bit values', () => {
		const ff = encodeFarbfeld({ width: 1, height: 1, data: new Uint8Array(4) })
		new DataView(ff.buffer).setUint16(16, 0x12ff, false)
		expect(decodeFarbfeld(ff).data[0]).toBe(0x12)
	})

	it('should detect the magic', () => {
		expect(isFarbfeld(encodeFarbfeld(image))).toBe(true)
		expect(isFarbfeld(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBe(false)
	})

	it('should reject a wrong magic', () => {
		const err = thrown(() => decodeFarbfeld(new Uint8Array(32)))
		expect(isConversionError(err, 'ParseError')).toBe(true)
	})

	it('should reject truncated pixel data', () => {
		const ff = encodeFarbfeld(image).subarray(0, 20)
		const err = thrown(() => decodeFarbfeld(ff))
		expect(err instanceof Error && err.message).toBe('Farbfeld data truncated: 2x1 needs 32 bytes, got 20')
	})

	it('should reject an empty image', () => {
		const ff = encodeFarbfeld({ width: 0, height: 3, data: new Uint8Array(0) })
		expect(thrown(() => decodeFarbfeld(ff))).toBeInstanceOf(Error)
	})
})
