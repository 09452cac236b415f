import { pixelHash, TRANSPARENT } from './pixel'
import { CACHE_SIZE, type KoiPixel } from './types'

/**
 * Recently seen colors, direct-mapped by `pixelHash`
 *
 * Encoder and decoder each own one and must apply the same stores in the
 * same order, otherwise INDEX references resolve to different colors.
 */
export class PixelCache {
	private slots: KoiPixel[] = Array(CACHE_SIZE).fill(TRANSPARENT)

	lookup(index: number): KoiPixel {
		return this.slots[index & (CACHE_SIZE - 1)] ?? TRANSPARENT
	}

	store(index: number, pixel: KoiPixel): void {
		this.slots[index & (CACHE_SIZE - 1)] = pixel
	}

	/**
	 * Store a pixel in its own slot and return that slot
	 */
	storePixel(pixel: KoiPixel): number {
		const index = pixelHash(pixel)
		this.slots[index] = pixel
		return index
	}

	/**
	 * Copy of the current slots, for comparing encoder and decoder state
	 */
	snapshot(): KoiPixel[] {
		return this.slots.map((pixel) => ({ ...pixel }))
	}
}
