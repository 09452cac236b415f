/**
 * KOI format types and constants
 *
 * The leading byte of every encoded unit selects one op-code. The ranges
 * below partition all 256 byte values; `OP_RANGES` is the single table both
 * sides of the codec dispatch on.
 */

// Magic bytes "koif"
export const KOI_MAGIC = 0x6b6f6966

export const KOI_HEADER_SIZE = 15

// Op codes
export const OP_INDEX = 0x00 // 00xxxxxx
export const OP_INDEX_END = 0x3f
export const OP_DIFF = 0x40 // 01rrggbb
export const OP_DIFF_END = 0x7f
export const OP_LUMA = 0x80 // 10gggggg rrrrbbbb
export const OP_LUMA_END = 0xbf
export const OP_ALPHA = 0xc0 // 110aaaaa
export const OP_ALPHA_END = 0xdf
export const OP_RUN = 0xe0 // reserved, never encoded
export const OP_RUN_END = 0xfb
export const OP_GRAY = 0xfc
export const OP_GRAY_ALPHA = 0xfd
export const OP_RGB = 0xfe
export const OP_RGBA = 0xff

// Masks
export const MASK_2 = 0xc0
export const MASK_6 = 0x3f
export const MASK_5 = 0x1f

// Biases of the difference encodings
export const DIFF_BIAS = 2 // dr, dg, db in [-2, 1]
export const LUMA_GREEN_BIAS = 32 // dg in [-32, 31]
export const LUMA_BIAS = 8 // dr - dg, db - dg in [-8, 7]
export const ALPHA_BIAS = 16 // da in [-16, 15]

export const CACHE_SIZE = 64

/**
 * End of stream marker, written once the declared pixel count is reached
 */
export const END_OF_IMAGE: readonly number[] = [0, 0, 0, 0, 0, 0, 0, 1]

/**
 * Op-code variants
 */
export type OpKind =
	| 'index'
	| 'diff'
	| 'luma'
	| 'alpha'
	| 'run'
	| 'gray'
	| 'grayAlpha'
	| 'rgb'
	| 'rgba'

export interface OpRange {
	readonly kind: OpKind
	readonly first: number
	readonly last: number
	/** Bytes following the leading byte */
	readonly payload: number
}

/**
 * Leading byte ranges, in ascending order
 */
export const OP_RANGES: readonly OpRange[] = [
	{ kind: 'index', first: OP_INDEX, last: OP_INDEX_END, payload: 0 },
	{ kind: 'diff', first: OP_DIFF, last: OP_DIFF_END, payload: 0 },
	{ kind: 'luma', first: OP_LUMA, last: OP_LUMA_END, payload: 1 },
	{ kind: 'alpha', first: OP_ALPHA, last: OP_ALPHA_END, payload: 0 },
	{ kind: 'run', first: OP_RUN, last: OP_RUN_END, payload: 0 },
	{ kind: 'gray', first: OP_GRAY, last: OP_GRAY, payload: 1 },
	{ kind: 'grayAlpha', first: OP_GRAY_ALPHA, last: OP_GRAY_ALPHA, payload: 2 },
	{ kind: 'rgb', first: OP_RGB, last: OP_RGB, payload: 3 },
	{ kind: 'rgba', first: OP_RGBA, last: OP_RGBA, payload: 4 },
]

const OP_TABLE: OpRange[] = []
for (const range of OP_RANGES) {
	for (let byte = range.first; byte <= range.last; byte++) {
		OP_TABLE[byte] = range
	}
}

/**
 * Look up the op-code range a leading byte belongs to
 */
export function opRange(byte: number): OpRange {
	const range = OP_TABLE[byte & 0xff]
	if (range === undefined) {
		throw new RangeError(`No op-code range covers byte ${byte}`)
	}
	return range
}

/**
 * Classify a leading byte
 */
export function classifyOp(byte: number): OpKind {
	return opRange(byte).kind
}

// Channels
export const Channels = {
	RGB: 3,
	RGBA: 4,
} as const

export type Channels = (typeof Channels)[keyof typeof Channels]

// Color space
export const ColorSpace = {
	SRGB: 0,
	Linear: 1,
} as const

export type ColorSpace = (typeof ColorSpace)[keyof typeof ColorSpace]

/**
 * Stream backend selection
 */
export type Compression = 'none' | 'deflate'

export const COMPRESSION_CODES: Record<Compression, number> = {
	none: 0,
	deflate: 1,
}

/**
 * RGBA pixel
 */
export interface KoiPixel {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}

/**
 * Signed per-channel difference between two pixels
 */
export interface PixelDelta {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}

/**
 * Construction parameters of an encode or decode session
 */
export interface PixelStreamOptions {
	/** Total number of pixels in the image */
	pixelCount: number
	channels: Channels
	compression?: Compression
}

/**
 * KOI header structure (15 bytes)
 */
export interface KoiHeader {
	width: number // 32-bit big-endian
	height: number // 32-bit big-endian
	channels: Channels
	colorspace: ColorSpace
	compression: Compression
}

/**
 * Container encode options
 */
export interface KoiEncodeOptions {
	/** Defaults to RGB when every pixel is opaque */
	channels?: Channels
	colorspace?: ColorSpace
	compression?: Compression
	/** Deflate level, 0-9 */
	level?: number
}
