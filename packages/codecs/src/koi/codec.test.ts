import { describe, expect, test } from 'vitest'
import { KoiCodec } from './codec'
import { decodeKoi, encodeKoi, readKoiHeader, writeKoiHeader } from './container'
import { KoiContractError, KoiDataError } from './errors'
import { catchError } from './testing'
import { END_OF_IMAGE, KOI_HEADER_SIZE } from './types'

describe('KOI Codec', () => {
	const codec = new KoiCodec()

	// Build an RGBA image from a per-pixel function
	const buildImage = (
		width: number,
		height: number,
		pixel: (x: number, y: number) => [number, number, number, number]
	) => {
		const data = new Uint8Array(width * height * 4)
		for (let y = 0; y < height; y++) {
			for (let x = 0; x < width; x++) data.set(pixel(x, y), (y * width + x) * 4)
		}
		return { width, height, data }
	}

	// Gray rows alternating with colored rows
	const createTestImage = (width: number, height: number) =>
		buildImage(width, height, (x, y) => {
			const v = (x * 23 + y * 7) % 256
			return y % 2 === 0 ? [v, v, v, 255] : [v, (v + 40) % 256, (v * 3) % 256, 255]
		})

	// Alpha steps of 12 with a short gray run at the start of each row
	const createAlphaImage = (width: number, height: number) =>
		buildImage(width, height, (x, y) => {
			const a = 255 - ((x + y) % 4) * 12
			return x < 2 ? [90, 90, 90, a] : [(x * 23 + y * 7) % 256, 60, (y * 40) % 256, a]
		})

	// Helper to create a single-color image
	const createSolidImage = (width: number, height: number) => ({
		width,
		height,
		data: new Uint8Array(width * height * 4).map((_, i) => (i % 4 === 3 ? 255 : 128)),
	})

	describe('header', () => {
		test('writes magic, dimensions and flags big-endian', () => {
			const header = writeKoiHeader({
				width: 258,
				height: 3,
				channels: 4,
				colorspace: 1,
				compression: 'deflate',
			})
			expect(Array.from(header)).toEqual([
				0x6b, 0x6f, 0x69, 0x66, 0, 0, 1, 2, 0, 0, 0, 3, 4, 1, 1,
			])
		})

		test('reads back what it wrote', () => {
			const header = { width: 640, height: 480, channels: 3, colorspace: 0, compression: 'none' } as const
			expect(readKoiHeader(writeKoiHeader(header))).toEqual(header)
		})

		test('rejects short input', () => {
			const error = catchError(KoiDataError, () => readKoiHeader(new Uint8Array(3)))
			expect(error.code).toBe('INVALID_HEADER')
			expect(error.message).toBe('Invalid KOI: too small')
		})

		test('rejects bad magic', () => {
			expect(() => decodeKoi(new Uint8Array(KOI_HEADER_SIZE))).toThrow('Invalid KOI: bad magic')
		})

		test('rejects unknown channel, colorspace and compression values', () => {
			const valid = writeKoiHeader({ width: 1, height: 1, channels: 4, colorspace: 0, compression: 'none' })
			const cases: [number, number, string][] = [
				[12, 2, 'Invalid KOI: unsupported channel count 2'],
				[13, 9, 'Invalid KOI: unknown colorspace 9'],
				[14, 7, 'Invalid KOI: unknown compression 7'],
			]
			for (const [offset, value, message] of cases) {
				const bad = valid.slice()
				bad[offset] = value
				const error = catchError(KoiDataError, () => readKoiHeader(bad))
				expect(error.code).toBe('INVALID_HEADER')
				expect(error.message).toBe(message)
			}
		})
	})

	describe('encode', () => {
		test('encodes a 1x1 opaque image as RGB', () => {
			const encoded = encodeKoi({ width: 1, height: 1, data: new Uint8Array([255, 128, 64, 255]) })
			expect(encoded[12]).toBe(3)
			expect(Array.from(encoded.subarray(KOI_HEADER_SIZE))).toEqual([
				0xfe,
				255,
				128,
				64,
				...END_OF_IMAGE,
			])
		})

		test('picks RGBA when any pixel is translucent', () => {
			expect(encodeKoi(createAlphaImage(4, 4))[12]).toBe(4)
		})

		test('honors an explicit channel count', () => {
			expect(encodeKoi(createTestImage(4, 4), { channels: 4 })[12]).toBe(4)
		})

		test('has correct end marker', () => {
			const encoded = encodeKoi(createTestImage(2, 2))
			expect(Array.from(encoded.subarray(encoded.length - 8))).toEqual([...END_OF_IMAGE])
		})

		test('empty image holds only header and end marker', () => {
			const encoded = encodeKoi({ width: 0, height: 0, data: new Uint8Array(0) })
			expect(encoded.length).toBe(KOI_HEADER_SIZE + 8)
			expect(decodeKoi(encoded)).toEqual({ width: 0, height: 0, data: new Uint8Array(0) })
		})

		test('rejects RGB output for a translucent image', () => {
			const error = catchError(KoiContractError, () =>
				encodeKoi(createAlphaImage(2, 2), { channels: 3 })
			)
			expect(error.code).toBe('ALPHA_NOT_OPAQUE')
		})

		test('rejects data that does not match the dimensions', () => {
			const error = catchError(KoiContractError, () =>
				encodeKoi({ width: 2, height: 2, data: new Uint8Array(12) })
			)
			expect(error.code).toBe('PIXEL_COUNT_MISMATCH')
		})
	})

	describe('decode', () => {
		test('preserves pixel data through encode/decode cycle', () => {
			const original = createTestImage(16, 16)
			expect(codec.decode(codec.encode(original))).toEqual(original)
		})

		test('preserves alpha through encode/decode cycle', () => {
			const original = createAlphaImage(16, 16)
			expect(codec.decode(codec.encode(original))).toEqual(original)
		})

		test('round trips with deflate compression', () => {
			const original = createAlphaImage(32, 32)
			const encoded = codec.encode(original, { compression: 'deflate', level: 9 })
			expect(encoded[14]).toBe(1)
			expect(codec.decode(encoded)).toEqual(original)
		})

		test('deflate shrinks a solid image further', () => {
			const original = createSolidImage(64, 64)
			const raw = codec.encode(original)
			const compressed = codec.encode(original, { compression: 'deflate' })

			// one gray literal, 4095 index hits, end marker
			expect(raw.length).toBe(KOI_HEADER_SIZE + 2 + 4095 + 8)
			expect(compressed.length).toBeLessThan(raw.length / 10)
			expect(codec.decode(compressed)).toEqual(original)
		})

		test('bogus dimensions fail on the missing pixel data', () => {
			const header = writeKoiHeader({
				width: 100000,
				height: 100000,
				channels: 3,
				colorspace: 0,
				compression: 'none',
			})
			const error = catchError(KoiDataError, () => decodeKoi(header))
			expect(error.code).toBe('UNEXPECTED_EOF')
		})

		test('fails on a corrupt end marker', () => {
			const encoded = codec.encode(createTestImage(4, 4))
			encoded[encoded.length - 1] = 0
			const error = catchError(KoiDataError, () => codec.decode(encoded))
			expect(error.code).toBe('INVALID_END_MARKER')
		})

		test('fails on truncated pixel data', () => {
			const encoded = codec.encode(createTestImage(4, 4))
			const error = catchError(KoiDataError, () => codec.decode(encoded.subarray(0, 20)))
			expect(error.code).toBe('UNEXPECTED_EOF')
		})
	})

	describe('KoiCodec', () => {
		test('detects KOI data', () => {
			expect(codec.canDecode(codec.encode(createTestImage(1, 1)))).toBe(true)
			expect(codec.canDecode(new Uint8Array([0x71, 0x6f, 0x69, 0x66]))).toBe(false)
			expect(codec.canDecode(new Uint8Array([0x6b, 0x6f]))).toBe(false)
		})

		test('has correct metadata', () => {
			expect(codec.name).toBe('KOI')
			expect(codec.extensions).toContain('.koi')
			expect(codec.mimeTypes).toContain('image/x-koi')
		})
	})
})
