import { PixelCache } from './cache'
import { KoiContractError } from './errors'
import {
	alphaDiff,
	colorDiff,
	isGray,
	lumaDiff,
	OPAQUE_BLACK,
	pixelDiff,
	pixelHash,
	pixelsEqual,
} from './pixel'
import {
	BufferSink,
	type ByteSink,
	createWriter,
	type StreamWriter,
	type WriterOptions,
} from './stream'
import {
	Channels,
	type Compression,
	END_OF_IMAGE,
	type KoiPixel,
	OP_GRAY,
	OP_GRAY_ALPHA,
	OP_INDEX,
	OP_RGB,
	OP_RGBA,
	type PixelStreamOptions,
} from './types'

export interface PixelEncoderOptions extends PixelStreamOptions {
	/** Deflate level, 0-9 */
	level?: number
	bufferSize?: number
}

/**
 * Validate session parameters shared by encoder and decoder
 */
export function validateStreamOptions(options: PixelStreamOptions): void {
	const { pixelCount, channels, compression = 'none' } = options
	if (!Number.isSafeInteger(pixelCount) || pixelCount < 0) {
		throw new KoiContractError('INVALID_OPTIONS', `Invalid pixel count: ${pixelCount}`, {
			pixelCount,
		})
	}
	if (channels !== Channels.RGB && channels !== Channels.RGBA) {
		throw new KoiContractError('INVALID_OPTIONS', `Unsupported channel count: ${channels}`, {
			channels,
		})
	}
	if (!isCompression(compression)) {
		throw new KoiContractError('INVALID_OPTIONS', `Unknown compression: ${compression}`, {
			compression,
		})
	}
}

function isCompression(value: string): value is Compression {
	return value === 'none' || value === 'deflate'
}

const PIXEL_CHANNELS = ['r', 'g', 'b', 'a'] as const

function isByte(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 255
}

/**
 * Streaming pixel encoder
 *
 * Accepts raw channel bytes in any chunking, encodes each completed pixel and
 * writes the end marker as soon as `pixelCount` pixels have been encoded.
 */
export class PixelEncoder {
	readonly channels: Channels
	readonly pixelCount: number

	private writer: StreamWriter
	private readonly pixelCache = new PixelCache()
	private prev: KoiPixel = OPAQUE_BLACK
	private pending: number[] = []
	private encoded = 0
	private done = false

	constructor(sink: ByteSink, options: PixelEncoderOptions) {
		validateStreamOptions(options)
		const writerOptions: WriterOptions = {
			compression: options.compression ?? 'none',
			level: options.level,
			bufferSize: options.bufferSize,
		}
		this.channels = options.channels
		this.pixelCount = options.pixelCount
		this.writer = createWriter(sink, writerOptions)

		if (this.pixelCount === 0) this.finish()
	}

	/** Pixels encoded so far */
	get pixelsIn(): number {
		return this.encoded
	}

	/** True once the end marker has been written */
	get finished(): boolean {
		return this.done
	}

	get cache(): PixelCache {
		return this.pixelCache
	}

	/**
	 * Feed raw channel bytes; returns the number of bytes accepted
	 */
	write(bytes: ArrayLike<number>): number {
		for (let i = 0; i < bytes.length; i++) {
			if (this.done) {
				throw new KoiContractError('SESSION_FINISHED', 'All pixels have already been encoded', {
					pixelCount: this.pixelCount,
					extraBytes: bytes.length - i,
				})
			}
			this.pending.push(bytes[i] ?? 0)
			if (this.pending.length === this.channels) {
				const [r = 0, g = 0, b = 0, a = 255] = this.pending
				this.pending = []
				this.encodePixel({ r, g, b, a })
			}
		}
		return bytes.length
	}

	/**
	 * Encode one complete pixel
	 */
	encodePixel(pixel: KoiPixel): void {
		if (this.done) {
			throw new KoiContractError('SESSION_FINISHED', 'All pixels have already been encoded', {
				pixelCount: this.pixelCount,
			})
		}
		for (const channel of PIXEL_CHANNELS) {
			const value = pixel[channel]
			if (!isByte(value)) {
				throw new KoiContractError(
					'INVALID_PIXEL',
					`Channel ${channel} of pixel ${this.encoded} is not a byte: ${value}`,
					{ pixel: this.encoded, channel, value }
				)
			}
		}
		if (this.channels === Channels.RGB && pixel.a !== 255) {
			throw new KoiContractError(
				'ALPHA_NOT_OPAQUE',
				'Alpha must be 255 for every pixel of an RGB stream',
				{ pixel: this.encoded, alpha: pixel.a }
			)
		}

		this.writer.write(this.classify(pixel, this.prev))
		this.pixelCache.storePixel(pixel)
		this.prev = pixel
		this.encoded++

		if (this.encoded === this.pixelCount) this.finish()
	}

	/**
	 * Flush buffered output; fails if a partial pixel is left over
	 */
	flush(): void {
		if (this.pending.length > 0) {
			throw new KoiContractError(
				'CHANNEL_MISMATCH',
				`${this.pending.length} byte(s) left over; input length is not a multiple of ${this.channels} channels`,
				{ buffered: this.pending.length, channels: this.channels, pixelsIn: this.encoded }
			)
		}
		this.writer.flush()
	}

	/**
	 * Pick the cheapest encoding, in priority order
	 */
	private classify(curr: KoiPixel, prev: KoiPixel): number[] {
		const hash = pixelHash(curr)
		if (pixelsEqual(this.pixelCache.lookup(hash), curr)) {
			return [OP_INDEX | hash]
		}

		const alpha = alphaDiff(prev, curr)
		if (alpha !== null) return [alpha]

		const gray = isGray(curr)
		if (curr.a !== prev.a) {
			return gray ? [OP_GRAY_ALPHA, curr.r, curr.a] : [OP_RGBA, curr.r, curr.g, curr.b, curr.a]
		}

		const delta = pixelDiff(curr, prev)

		const diff = colorDiff(delta)
		if (diff !== null) return [diff]

		const luma = lumaDiff(delta)
		if (luma !== null) return luma

		if (gray) return [OP_GRAY, curr.r]

		return [OP_RGB, curr.r, curr.g, curr.b]
	}

	private finish(): void {
		this.writer.write(END_OF_IMAGE)
		this.writer.finish()
		this.done = true
	}
}

/**
 * Encode a whole pixel buffer into a new byte array
 */
export function encodePixels(data: Uint8Array, options: PixelEncoderOptions): Uint8Array {
	validateStreamOptions(options)
	const expected = options.pixelCount * options.channels
	if (data.length !== expected) {
		throw new KoiContractError(
			'PIXEL_COUNT_MISMATCH',
			`Expected ${expected} bytes for ${options.pixelCount} pixels, got ${data.length}`,
			{ expected, actual: data.length }
		)
	}

	const sink = new BufferSink()
	const encoder = new PixelEncoder(sink, options)
	encoder.write(data)
	encoder.flush()
	return sink.toArray()
}
