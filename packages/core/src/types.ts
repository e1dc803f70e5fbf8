/**
 * Origin for a seek, as in lseek(2)
 */
export type SeekOrigin = 'start' | 'current' | 'end'

/**
 * Position queries shared by readers and writers
 */
export interface Seekable {
	/** Current position in bytes from the start of the stream */
	tell(): number
	/** Move to `offset` relative to `origin` and return the new position */
	seek(offset: number, origin?: SeekOrigin): number
}

/**
 * Byte source with random access
 *
 * `read` fills as much of `target` as it can and returns the number of bytes
 * copied. It returns 0 only at end of stream.
 */
export interface SeekableReader extends Seekable {
	read(target: Uint8Array): number
}

/**
 * Byte sink with random access
 *
 * Writing at a position inside the stream overwrites the bytes there.
 */
export interface SeekableWriter extends Seekable {
	write(bytes: Uint8Array): void
}

/**
 * Stream that can be both read and written, such as an in-memory file
 */
export interface SeekableStream extends SeekableReader, SeekableWriter {}
