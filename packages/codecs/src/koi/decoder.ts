import { PixelCache } from './cache'
import { validateStreamOptions } from './encoder'
import { KoiContractError, KoiDataError } from './errors'
import { applyAlphaDiff, applyDiff, applyLuma, OPAQUE_BLACK, writePixel } from './pixel'
import { BufferSource, type ByteSource, createReader, type StreamReader } from './stream'
import {
	Channels,
	END_OF_IMAGE,
	type KoiPixel,
	MASK_6,
	opRange,
	type PixelStreamOptions,
} from './types'

const INITIAL_READ_ALL_PIXELS = 64 * 1024

/**
 * Streaming pixel decoder
 *
 * Produces exactly `pixelCount` pixels, then expects the end marker. The
 * marker is checked by the first read after the last pixel.
 */
export class PixelDecoder {
	readonly channels: Channels
	readonly pixelCount: number

	private reader: StreamReader
	private readonly pixelCache = new PixelCache()
	private prev: KoiPixel = OPAQUE_BLACK
	private decoded = 0
	private done = false

	constructor(source: ByteSource, options: PixelStreamOptions) {
		validateStreamOptions(options)
		this.channels = options.channels
		this.pixelCount = options.pixelCount
		this.reader = createReader(source, options.compression ?? 'none')
	}

	/** Pixels decoded so far */
	get pixelsIn(): number {
		return this.decoded
	}

	/** True once the end marker has been verified */
	get finished(): boolean {
		return this.done
	}

	get cache(): PixelCache {
		return this.pixelCache
	}

	/**
	 * Decode the next pixel, or verify the end marker and return null once all
	 * pixels have been produced
	 */
	readPixel(): KoiPixel | null {
		if (this.done) return null
		if (this.decoded >= this.pixelCount) {
			this.verifyEnd()
			return null
		}

		const pixel = this.dispatch(this.reader.read(1)[0] ?? 0)
		this.pixelCache.storePixel(pixel)
		this.prev = pixel
		this.decoded++
		return pixel
	}

	/**
	 * Fill `out` with as many whole pixels as fit; returns the number of bytes
	 * written, 0 at the end of the stream
	 */
	read(out: Uint8Array): number {
		if (out.length < this.channels) {
			throw new KoiContractError(
				'BUFFER_TOO_SMALL',
				`Output buffer must hold at least one pixel (${this.channels} bytes)`,
				{ length: out.length, channels: this.channels }
			)
		}

		let offset = 0
		while (offset + this.channels <= out.length) {
			if (offset > 0 && this.decoded >= this.pixelCount) break
			const pixel = this.readPixel()
			if (pixel === null) break
			writePixel(out, offset, pixel, this.channels)
			offset += this.channels
		}
		return offset
	}

	/**
	 * Decode every remaining pixel and verify the end marker
	 */
	readAll(): Uint8Array {
		const total = (this.pixelCount - this.decoded) * this.channels
		// grows with the decoded pixels, capped at the declared total
		let out = new Uint8Array(Math.min(total, INITIAL_READ_ALL_PIXELS * this.channels))
		let offset = 0
		for (let pixel = this.readPixel(); pixel !== null; pixel = this.readPixel()) {
			if (offset === out.length) {
				const grown = new Uint8Array(Math.min(total, out.length * 2))
				grown.set(out)
				out = grown
			}
			writePixel(out, offset, pixel, this.channels)
			offset += this.channels
		}
		return out
	}

	private dispatch(op: number): KoiPixel {
		const prev = this.prev
		const range = opRange(op)

		switch (range.kind) {
			case 'index':
				return this.pixelCache.lookup(op & MASK_6)
			case 'diff':
				return applyDiff(prev, op)
			case 'luma':
				return applyLuma(prev, op, this.readByte())
			case 'gray': {
				const v = this.readByte()
				return { r: v, g: v, b: v, a: prev.a }
			}
			case 'rgb': {
				const [r = 0, g = 0, b = 0] = this.reader.read(3)
				return { r, g, b, a: prev.a }
			}
			case 'alpha':
				this.expectAlphaStream(op)
				return applyAlphaDiff(prev, op)
			case 'grayAlpha': {
				this.expectAlphaStream(op)
				const [v = 0, a = 0] = this.reader.read(2)
				return { r: v, g: v, b: v, a }
			}
			case 'rgba': {
				this.expectAlphaStream(op)
				const [r = 0, g = 0, b = 0, a = 0] = this.reader.read(4)
				return { r, g, b, a }
			}
			case 'run':
				throw new KoiDataError('UNEXPECTED_OPCODE', `Reserved op-code 0x${hex(op)}`, {
					op,
					pixel: this.decoded,
				})
		}
	}

	private readByte(): number {
		return this.reader.read(1)[0] ?? 0
	}

	private expectAlphaStream(op: number): void {
		if (this.channels === Channels.RGB) {
			throw new KoiDataError(
				'UNEXPECTED_OPCODE',
				`Op-code 0x${hex(op)} changes alpha in an RGB stream`,
				{ op, pixel: this.decoded }
			)
		}
	}

	private verifyEnd(): void {
		const marker = this.reader.read(END_OF_IMAGE.length)
		for (let i = 0; i < END_OF_IMAGE.length; i++) {
			if (marker[i] !== END_OF_IMAGE[i]) {
				throw new KoiDataError('INVALID_END_MARKER', 'Invalid end of image marker', {
					expected: END_OF_IMAGE,
					actual: Array.from(marker),
				})
			}
		}
		this.done = true
	}
}

function hex(byte: number): string {
	return byte.toString(16).padStart(2, '0')
}

/**
 * Decode a whole encoded pixel stream
 */
export function decodePixels(data: Uint8Array, options: PixelStreamOptions): Uint8Array {
	const decoder = new PixelDecoder(new BufferSource(data), options)
	return decoder.readAll()
}
