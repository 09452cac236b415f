import {
	ALPHA_BIAS,
	CACHE_SIZE,
	DIFF_BIAS,
	type KoiPixel,
	LUMA_BIAS,
	LUMA_GREEN_BIAS,
	MASK_5,
	MASK_6,
	OP_ALPHA,
	OP_DIFF,
	OP_LUMA,
	type PixelDelta,
} from './types'

export const TRANSPARENT: KoiPixel = { r: 0, g: 0, b: 0, a: 0 }
export const OPAQUE_BLACK: KoiPixel = { r: 0, g: 0, b: 0, a: 255 }

/**
 * Calculate cache slot for pixel
 */
export function pixelHash(pixel: KoiPixel): number {
	return (pixel.r * 3 + pixel.g * 5 + pixel.b * 7 + pixel.a * 11) % CACHE_SIZE
}

/**
 * Compare two pixels for equality
 */
export function pixelsEqual(a: KoiPixel, b: KoiPixel): boolean {
	return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a
}

export function isGray(pixel: KoiPixel): boolean {
	return pixel.r === pixel.g && pixel.g === pixel.b
}

/**
 * Reinterpret a wrapped byte difference as a signed value (-128..127)
 */
export function wrapDelta(value: number): number {
	const byte = value & 0xff
	return byte > 127 ? byte - 256 : byte
}

/**
 * Add a signed delta to a channel, wrapping modulo 256
 */
export function wrapAdd(channel: number, delta: number): number {
	return (channel + delta) & 0xff
}

/**
 * Channel-wise wraparound difference `curr - prev`
 */
export function pixelDiff(curr: KoiPixel, prev: KoiPixel): PixelDelta {
	return {
		r: wrapDelta(curr.r - prev.r),
		g: wrapDelta(curr.g - prev.g),
		b: wrapDelta(curr.b - prev.b),
		a: wrapDelta(curr.a - prev.a),
	}
}

function within(value: number, min: number, max: number): boolean {
	return value >= min && value <= max
}

/**
 * Pack a small RGB difference into a DIFF op byte, or null if any channel is
 * out of range or alpha changed
 */
export function colorDiff(delta: PixelDelta): number | null {
	const { r, g, b, a } = delta
	if (a !== 0) return null
	const lo = -DIFF_BIAS
	const hi = DIFF_BIAS - 1
	if (!within(r, lo, hi) || !within(g, lo, hi) || !within(b, lo, hi)) return null
	return OP_DIFF | ((r + DIFF_BIAS) << 4) | ((g + DIFF_BIAS) << 2) | (b + DIFF_BIAS)
}

/**
 * Pack a green-relative difference into the two LUMA bytes, or null if it
 * does not fit
 */
export function lumaDiff(delta: PixelDelta): [number, number] | null {
	const { r, g, b, a } = delta
	if (a !== 0) return null
	const dgr = r - g
	const dgb = b - g
	if (!within(g, -LUMA_GREEN_BIAS, LUMA_GREEN_BIAS - 1)) return null
	if (!within(dgr, -LUMA_BIAS, LUMA_BIAS - 1) || !within(dgb, -LUMA_BIAS, LUMA_BIAS - 1)) {
		return null
	}
	return [OP_LUMA | (g + LUMA_GREEN_BIAS), ((dgr + LUMA_BIAS) << 4) | (dgb + LUMA_BIAS)]
}

/**
 * Pack an alpha-only change into an ALPHA op byte, or null if RGB changed or
 * the alpha step is out of range
 */
export function alphaDiff(prev: KoiPixel, curr: KoiPixel): number | null {
	if (prev.r !== curr.r || prev.g !== curr.g || prev.b !== curr.b) return null
	const da = wrapDelta(curr.a - prev.a)
	if (da === 0 || !within(da, -ALPHA_BIAS, ALPHA_BIAS - 1)) return null
	return OP_ALPHA | (da + ALPHA_BIAS)
}

/**
 * Reconstruct a pixel from a DIFF op byte
 */
export function applyDiff(prev: KoiPixel, op: number): KoiPixel {
	return {
		r: wrapAdd(prev.r, ((op >> 4) & 0x03) - DIFF_BIAS),
		g: wrapAdd(prev.g, ((op >> 2) & 0x03) - DIFF_BIAS),
		b: wrapAdd(prev.b, (op & 0x03) - DIFF_BIAS),
		a: prev.a,
	}
}

/**
 * Reconstruct a pixel from the two LUMA bytes
 */
export function applyLuma(prev: KoiPixel, op: number, payload: number): KoiPixel {
	const dg = (op & MASK_6) - LUMA_GREEN_BIAS
	const dr = dg + ((payload >> 4) & 0x0f) - LUMA_BIAS
	const db = dg + (payload & 0x0f) - LUMA_BIAS
	return {
		r: wrapAdd(prev.r, dr),
		g: wrapAdd(prev.g, dg),
		b: wrapAdd(prev.b, db),
		a: prev.a,
	}
}

/**
 * Reconstruct a pixel from an ALPHA op byte
 */
export function applyAlphaDiff(prev: KoiPixel, op: number): KoiPixel {
	return { ...prev, a: wrapAdd(prev.a, (op & MASK_5) - ALPHA_BIAS) }
}

/**
 * Read a pixel out of a byte buffer; missing alpha is 255
 */
export function readPixel(bytes: Uint8Array, offset: number, channels: number): KoiPixel {
	return {
		r: bytes[offset] ?? 0,
		g: bytes[offset + 1] ?? 0,
		b: bytes[offset + 2] ?? 0,
		a: channels === 4 ? (bytes[offset + 3] ?? 0) : 255,
	}
}

/**
 * Write the first `channels` bytes of a pixel into a byte buffer
 */
export function writePixel(
	bytes: Uint8Array,
	offset: number,
	pixel: KoiPixel,
	channels: number
): void {
	bytes[offset] = pixel.r
	bytes[offset + 1] = pixel.g
	bytes[offset + 2] = pixel.b
	if (channels === 4) bytes[offset + 3] = pixel.a
}
