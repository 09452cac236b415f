import { type ImageData, isOpaque, rgbaToRgb, rgbToRgba } from '@koi-image/core'
import { PixelDecoder } from './decoder'
import { PixelEncoder } from './encoder'
import { KoiContractError, KoiDataError } from './errors'
import { BufferSink, BufferSource } from './stream'
import {
	Channels,
	ColorSpace,
	COMPRESSION_CODES,
	type Compression,
	KOI_HEADER_SIZE,
	KOI_MAGIC,
	type KoiEncodeOptions,
	type KoiHeader,
} from './types'

/**
 * Write the 15-byte header
 */
export function writeKoiHeader(header: KoiHeader): Uint8Array {
	const bytes = new Uint8Array(KOI_HEADER_SIZE)
	const view = new DataView(bytes.buffer)
	view.setUint32(0, KOI_MAGIC)
	view.setUint32(4, header.width)
	view.setUint32(8, header.height)
	view.setUint8(12, header.channels)
	view.setUint8(13, header.colorspace)
	view.setUint8(14, COMPRESSION_CODES[header.compression])
	return bytes
}

/**
 * Read and validate the header
 */
export function readKoiHeader(data: Uint8Array): KoiHeader {
	if (data.length < KOI_HEADER_SIZE) {
		throw new KoiDataError('INVALID_HEADER', 'Invalid KOI: too small', { length: data.length })
	}

	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	const magic = view.getUint32(0)
	if (magic !== KOI_MAGIC) {
		throw new KoiDataError('INVALID_HEADER', 'Invalid KOI: bad magic', { magic })
	}

	const channels = view.getUint8(12)
	if (channels !== Channels.RGB && channels !== Channels.RGBA) {
		throw new KoiDataError('INVALID_HEADER', `Invalid KOI: unsupported channel count ${channels}`, {
			channels,
		})
	}

	const colorspace = view.getUint8(13)
	if (colorspace !== ColorSpace.SRGB && colorspace !== ColorSpace.Linear) {
		throw new KoiDataError('INVALID_HEADER', `Invalid KOI: unknown colorspace ${colorspace}`, {
			colorspace,
		})
	}

	const code = view.getUint8(14)
	const compression = compressionFromCode(code)
	if (compression === undefined) {
		throw new KoiDataError('INVALID_HEADER', `Invalid KOI: unknown compression ${code}`, {
			compression: code,
		})
	}

	return {
		width: view.getUint32(4),
		height: view.getUint32(8),
		channels,
		colorspace,
		compression,
	}
}

function compressionFromCode(code: number): Compression | undefined {
	if (code === COMPRESSION_CODES.none) return 'none'
	if (code === COMPRESSION_CODES.deflate) return 'deflate'
	return undefined
}

/**
 * Encode ImageData to KOI
 */
export function encodeKoi(image: ImageData, options: KoiEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	const pixelCount = width * height

	if (data.length !== pixelCount * 4) {
		throw new KoiContractError(
			'PIXEL_COUNT_MISMATCH',
			`Expected ${pixelCount * 4} RGBA bytes for ${width}x${height}, got ${data.length}`,
			{ width, height, length: data.length }
		)
	}

	const channels = options.channels ?? (isOpaque(image) ? Channels.RGB : Channels.RGBA)
	const compression = options.compression ?? 'none'

	if (channels === Channels.RGB && !isOpaque(image)) {
		throw new KoiContractError('ALPHA_NOT_OPAQUE', 'RGB output requires an opaque image', {
			width,
			height,
		})
	}

	const sink = new BufferSink()
	sink.write(
		writeKoiHeader({
			width,
			height,
			channels,
			colorspace: options.colorspace ?? ColorSpace.SRGB,
			compression,
		})
	)

	const encoder = new PixelEncoder(sink, {
		pixelCount,
		channels,
		compression,
		level: options.level,
	})
	encoder.write(channels === Channels.RGB ? rgbaToRgb(data) : data)
	encoder.flush()

	return sink.toArray()
}

/**
 * Decode KOI to ImageData
 */
export function decodeKoi(data: Uint8Array): ImageData {
	const header = readKoiHeader(data)
	const { width, height, channels, compression } = header

	const decoder = new PixelDecoder(new BufferSource(data.subarray(KOI_HEADER_SIZE)), {
		pixelCount: width * height,
		channels,
		compression,
	})
	const pixels = decoder.readAll()

	return {
		width,
		height,
		data: channels === Channels.RGB ? rgbToRgba(pixels) : pixels,
	}
}
