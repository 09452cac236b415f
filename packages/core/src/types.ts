/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Image codec with format sniffing
 */
export interface ImageCodec<O = unknown> {
	readonly name: string
	readonly mimeTypes: readonly string[]
	readonly extensions: readonly string[]
	canDecode(data: Uint8Array): boolean
	decode(data: Uint8Array): ImageData
	encode(image: ImageData, options?: O): Uint8Array
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Number of pixels in an image
 */
export function pixelCount(image: ImageData): number {
	return image.width * image.height
}

/**
 * Whether every pixel of the image is fully opaque
 */
export function isOpaque(image: ImageData): boolean {
	const { data } = image
	for (let i = 3; i < data.length; i += 4) {
		if (data[i] !== 255) return false
	}
	return true
}

/**
 * Drop the alpha byte of every pixel (RGBA -> RGB)
 */
export function rgbaToRgb(rgba: Uint8Array): Uint8Array {
	const pixels = Math.floor(rgba.length / 4)
	const rgb = new Uint8Array(pixels * 3)
	for (let i = 0, o = 0; i < pixels * 4; i += 4) {
		rgb[o++] = rgba[i] ?? 0
		rgb[o++] = rgba[i + 1] ?? 0
		rgb[o++] = rgba[i + 2] ?? 0
	}
	return rgb
}

/**
 * Add an opaque alpha byte to every pixel (RGB -> RGBA)
 */
export function rgbToRgba(rgb: Uint8Array): Uint8Array {
	const pixels = Math.floor(rgb.length / 3)
	const rgba = new Uint8Array(pixels * 4)
	for (let i = 0, o = 0; i < pixels * 3; i += 3) {
		rgba[o++] = rgb[i] ?? 0
		rgba[o++] = rgb[i + 1] ?? 0
		rgba[o++] = rgb[i + 2] ?? 0
		rgba[o++] = 255
	}
	return rgba
}
