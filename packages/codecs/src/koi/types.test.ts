import fc from 'fast-check'
import { describe, expect, test } from 'vitest'
import { alphaDiff, colorDiff, lumaDiff } from './pixel'
import {
	classifyOp,
	END_OF_IMAGE,
	OP_GRAY,
	OP_GRAY_ALPHA,
	OP_RANGES,
	OP_RGB,
	OP_RGBA,
	opRange,
} from './types'

describe('KOI op-code grammar', () => {
	test('every leading byte is claimed by exactly one op-code', () => {
		for (let byte = 0; byte < 256; byte++) {
			const claims = OP_RANGES.filter((range) => range.first <= byte && byte <= range.last)
			expect(claims).toHaveLength(1)
		}
	})

	test('ranges are ascending and cover 256 values', () => {
		let next = 0
		for (const range of OP_RANGES) {
			expect(range.first).toBe(next)
			next = range.last + 1
		}
		expect(next).toBe(256)
	})

	test('classifies range edges', () => {
		expect(classifyOp(0x00)).toBe('index')
		expect(classifyOp(0x3f)).toBe('index')
		expect(classifyOp(0x40)).toBe('diff')
		expect(classifyOp(0x7f)).toBe('diff')
		expect(classifyOp(0x80)).toBe('luma')
		expect(classifyOp(0xbf)).toBe('luma')
		expect(classifyOp(0xc0)).toBe('alpha')
		expect(classifyOp(0xdf)).toBe('alpha')
		expect(classifyOp(0xe0)).toBe('run')
		expect(classifyOp(0xfb)).toBe('run')
		expect(classifyOp(OP_GRAY)).toBe('gray')
		expect(classifyOp(OP_GRAY_ALPHA)).toBe('grayAlpha')
		expect(classifyOp(OP_RGB)).toBe('rgb')
		expect(classifyOp(OP_RGBA)).toBe('rgba')
	})

	test('payload sizes match the encoded unit lengths', () => {
		expect(opRange(0x10).payload).toBe(0)
		expect(opRange(0x90).payload).toBe(1)
		expect(opRange(OP_GRAY).payload).toBe(1)
		expect(opRange(OP_GRAY_ALPHA).payload).toBe(2)
		expect(opRange(OP_RGB).payload).toBe(3)
		expect(opRange(OP_RGBA).payload).toBe(4)
	})

	test('end marker is eight bytes', () => {
		expect(END_OF_IMAGE).toEqual([0, 0, 0, 0, 0, 0, 0, 1])
	})

	describe('encoder output lands in its own range', () => {
		test('coarse differences', () => {
			const d = fc.integer({ min: -2, max: 1 })
			fc.assert(
				fc.property(d, d, d, (r, g, b) => {
					const op = colorDiff({ r, g, b, a: 0 })
					expect(op).not.toBeNull()
					expect(classifyOp(op ?? -1)).toBe('diff')
				})
			)
		})

		test('luma differences', () => {
			const rel = fc.integer({ min: -8, max: 7 })
			fc.assert(
				fc.property(fc.integer({ min: -32, max: 31 }), rel, rel, (g, dr, db) => {
					const luma = lumaDiff({ r: g + dr, g, b: g + db, a: 0 })
					expect(luma).not.toBeNull()
					expect(classifyOp(luma?.[0] ?? -1)).toBe('luma')
				})
			)
		})

		test('alpha differences', () => {
			fc.assert(
				fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: -16, max: 15 }), (a, da) => {
					fc.pre(da !== 0)
					const op = alphaDiff({ r: 1, g: 2, b: 3, a }, { r: 1, g: 2, b: 3, a: (a + da) & 0xff })
					expect(op).not.toBeNull()
					expect(classifyOp(op ?? -1)).toBe('alpha')
				})
			)
		})
	})
})
