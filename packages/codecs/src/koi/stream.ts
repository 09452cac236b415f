/**
 * Stream backends for the pixel codec
 *
 * The encoder and decoder only see `StreamWriter` / `StreamReader`. Which
 * backend sits underneath (raw bytes or a zlib stream) is chosen once when the
 * session is created.
 */

import { type DeflateOptions, Unzlib, Zlib } from 'fflate'
import { KoiContractError, KoiDataError } from './errors'
import type { Compression } from './types'

/**
 * Destination of encoded bytes supplied by the caller
 */
export interface ByteSink {
	write(chunk: Uint8Array): void
	flush?(): void
}

/**
 * Origin of encoded bytes supplied by the caller. An empty result means the
 * source is exhausted.
 */
export interface ByteSource {
	read(maxLength: number): Uint8Array
}

export interface StreamWriter {
	write(bytes: ArrayLike<number>): void
	/** Push buffered bytes towards the sink */
	flush(): void
	/** Flush and close the backend's framing; no writes may follow */
	finish(): void
}

export interface StreamReader {
	/** Read exactly `length` bytes */
	read(length: number): Uint8Array
}

export type DeflateLevel = NonNullable<DeflateOptions['level']>

export interface WriterOptions {
	compression?: Compression
	/** Deflate level, 0-9 */
	level?: number
	/** Bytes staged before they are handed to the backend */
	bufferSize?: number
}

const DEFAULT_BUFFER_SIZE = 64 * 1024
const DEFAULT_READ_SIZE = 16 * 1024
const DEFAULT_LEVEL: DeflateLevel = 6

export function isDeflateLevel(level: number): level is DeflateLevel {
	return Number.isInteger(level) && level >= 0 && level <= 9
}

// ─────────────────────────────────────────────────────────────────────────────
// In-memory sink and source
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sink collecting everything written to it
 */
export class BufferSink implements ByteSink {
	private chunks: Uint8Array[] = []
	private length = 0
	private flushCount = 0

	write(chunk: Uint8Array): void {
		this.chunks.push(chunk.slice())
		this.length += chunk.length
	}

	flush(): void {
		this.flushCount++
	}

	/** Number of times the sink was flushed */
	get flushes(): number {
		return this.flushCount
	}

	get byteLength(): number {
		return this.length
	}

	toArray(): Uint8Array {
		return concatArrays(this.chunks)
	}
}

/**
 * Source serving a byte array in chunks of at most `maxLength`
 */
export class BufferSource implements ByteSource {
	private offset = 0

	constructor(private data: Uint8Array) {}

	read(maxLength: number): Uint8Array {
		const end = Math.min(this.data.length, this.offset + maxLength)
		const chunk = this.data.subarray(this.offset, end)
		this.offset = end
		return chunk
	}

	get remaining(): number {
		return this.data.length - this.offset
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Writers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stages small writes into blocks before handing them to the backend
 */
abstract class BufferedWriter implements StreamWriter {
	private buffer: Uint8Array
	private length = 0
	private closed = false

	constructor(bufferSize: number) {
		this.buffer = new Uint8Array(bufferSize)
	}

	protected abstract emit(block: Uint8Array): void
	protected abstract close(): void
	protected abstract flushSink(): void

	write(bytes: ArrayLike<number>): void {
		if (this.closed) {
			throw new KoiContractError('SESSION_FINISHED', 'Write after the stream was finished')
		}
		for (let i = 0; i < bytes.length; i++) {
			this.buffer[this.length++] = bytes[i] ?? 0
			if (this.length === this.buffer.length) this.drain()
		}
	}

	flush(): void {
		this.drain()
		this.flushSink()
	}

	finish(): void {
		if (this.closed) return
		this.drain()
		this.closed = true
		this.close()
		this.flushSink()
	}

	private drain(): void {
		if (this.length === 0) return
		const block = this.buffer.slice(0, this.length)
		this.length = 0
		this.emit(block)
	}
}

/**
 * Pass-through backend
 */
export class RawWriter extends BufferedWriter {
	constructor(
		private sink: ByteSink,
		bufferSize = DEFAULT_BUFFER_SIZE
	) {
		super(bufferSize)
	}

	protected emit(block: Uint8Array): void {
		this.sink.write(block)
	}

	protected close(): void {}

	protected flushSink(): void {
		this.sink.flush?.()
	}
}

/**
 * zlib (RFC 1950) backend
 *
 * Compressed output reaches the sink as the compressor produces it; the last
 * block and the checksum are only written by `finish`.
 */
export class DeflateWriter extends BufferedWriter {
	private zlib: Zlib

	constructor(
		private sink: ByteSink,
		level: DeflateLevel = DEFAULT_LEVEL,
		bufferSize = DEFAULT_BUFFER_SIZE
	) {
		super(bufferSize)
		this.zlib = new Zlib({ level }, (chunk) => {
			if (chunk.length > 0) this.sink.write(chunk)
		})
	}

	protected emit(block: Uint8Array): void {
		this.zlib.push(block)
	}

	protected close(): void {
		this.zlib.push(new Uint8Array(0), true)
	}

	protected flushSink(): void {
		this.sink.flush?.()
	}
}

/**
 * Create the writer for a backend
 */
export function createWriter(sink: ByteSink, options: WriterOptions = {}): StreamWriter {
	const { compression = 'none', level = DEFAULT_LEVEL, bufferSize = DEFAULT_BUFFER_SIZE } = options

	if (!Number.isInteger(bufferSize) || bufferSize < 1) {
		throw new KoiContractError('INVALID_OPTIONS', `Invalid buffer size: ${bufferSize}`, {
			bufferSize,
		})
	}

	switch (compression) {
		case 'none':
			return new RawWriter(sink, bufferSize)
		case 'deflate':
			if (!isDeflateLevel(level)) {
				throw new KoiContractError('INVALID_OPTIONS', `Invalid deflate level: ${level}`, { level })
			}
			return new DeflateWriter(sink, level, bufferSize)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Readers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * FIFO of byte chunks
 */
class ByteQueue {
	private chunks: Uint8Array[] = []
	private head = 0
	size = 0

	push(chunk: Uint8Array): void {
		if (chunk.length === 0) return
		this.chunks.push(chunk)
		this.size += chunk.length
	}

	/**
	 * Remove and return `length` bytes; the caller checks `size` first
	 */
	take(length: number): Uint8Array {
		const out = new Uint8Array(length)
		let filled = 0
		while (filled < length) {
			const chunk = this.chunks[0]
			if (chunk === undefined) break
			const count = Math.min(chunk.length - this.head, length - filled)
			out.set(chunk.subarray(this.head, this.head + count), filled)
			filled += count
			this.head += count
			if (this.head === chunk.length) {
				this.chunks.shift()
				this.head = 0
			}
		}
		this.size -= filled
		return out
	}
}

function unexpectedEof(wanted: number, available: number): KoiDataError {
	return new KoiDataError('UNEXPECTED_EOF', 'Unexpected end of data', { wanted, available })
}

/**
 * Pass-through backend
 *
 * Reads ahead from the source, so bytes after the pixel stream may be
 * consumed.
 */
export class RawReader implements StreamReader {
	private queue = new ByteQueue()

	constructor(
		private source: ByteSource,
		private readSize = DEFAULT_READ_SIZE
	) {}

	read(length: number): Uint8Array {
		while (this.queue.size < length) {
			const chunk = this.source.read(Math.max(this.readSize, length - this.queue.size))
			if (chunk.length === 0) throw unexpectedEof(length, this.queue.size)
			this.queue.push(chunk.slice())
		}
		return this.queue.take(length)
	}
}

/**
 * zlib (RFC 1950) backend
 */
export class InflateReader implements StreamReader {
	private queue = new ByteQueue()
	private unzlib: Unzlib
	private ended = false

	constructor(
		private source: ByteSource,
		private readSize = DEFAULT_READ_SIZE
	) {
		this.unzlib = new Unzlib((chunk) => {
			this.queue.push(chunk.slice())
		})
	}

	read(length: number): Uint8Array {
		while (this.queue.size < length) {
			if (this.ended) throw unexpectedEof(length, this.queue.size)
			const chunk = this.source.read(this.readSize)
			if (chunk.length === 0) {
				this.ended = true
				this.unzlib.push(new Uint8Array(0), true)
			} else {
				this.unzlib.push(chunk.slice())
			}
		}
		return this.queue.take(length)
	}
}

/**
 * Create the reader for a backend
 */
export function createReader(source: ByteSource, compression: Compression = 'none'): StreamReader {
	switch (compression) {
		case 'none':
			return new RawReader(source)
		case 'deflate':
			return new InflateReader(source)
	}
}

/**
 * Concatenate arrays
 */
export function concatArrays(arrays: readonly Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
	const result = new Uint8Array(totalLength)
	let offset = 0

	for (const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}

	return result
}
