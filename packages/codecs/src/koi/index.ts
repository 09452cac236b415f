/**
 * KOI lossless pixel-stream codec
 *
 * Features:
 * - 64-slot recent-color cache with 1-byte references
 * - Coarse, luma and alpha-only difference encodings
 * - Gray and full-color literals, with or without alpha
 * - RGB and RGBA streams
 * - Raw or zlib-compressed stream backend
 */

export * from './types'
export * from './errors'
export * from './pixel'
export * from './cache'
export * from './stream'
export * from './encoder'
export * from './decoder'
export * from './container'
export * from './codec'
