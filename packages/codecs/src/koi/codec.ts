import type { ImageCodec, ImageData } from '@koi-image/core'
import { decodeKoi, encodeKoi } from './container'
import { KOI_MAGIC, type KoiEncodeOptions } from './types'

/**
 * KOI codec
 */
export class KoiCodec implements ImageCodec<KoiEncodeOptions> {
	readonly name = 'KOI'
	readonly mimeTypes = ['image/x-koi']
	readonly extensions = ['.koi']

	canDecode(data: Uint8Array): boolean {
		if (data.length < 4) return false
		const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
		return view.getUint32(0) === KOI_MAGIC
	}

	decode(data: Uint8Array): ImageData {
		return decodeKoi(data)
	}

	encode(image: ImageData, options?: KoiEncodeOptions): Uint8Array {
		return encodeKoi(image, options)
	}
}
