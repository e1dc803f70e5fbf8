import type { SeekOrigin, SeekableStream } from './types'

/**
 * In-memory seekable stream
 *
 * Reads and writes share one position. Writing past the end grows the
 * stream; seeking past the end and then writing leaves a zero-filled gap.
 */
export class MemoryStream implements SeekableStream {
	private data: Uint8Array
	private size: number
	private position = 0

	constructor(initial?: Uint8Array) {
		if (initial) {
			this.data = new Uint8Array(initial)
			this.size = initial.length
		} else {
			this.data = new Uint8Array(4096)
			this.size = 0
		}
	}

	get length(): number {
		return this.size
	}

	read(target: Uint8Array): number {
		const available = this.size - this.position
		if (available <= 0) return 0
		const count = Math.min(available, target.length)
		target.set(this.data.subarray(this.position, this.position + count))
		this.position += count
		return count
	}

	write(bytes: Uint8Array): void {
		const end = this.position + bytes.length
		this.ensureCapacity(end)
		this.data.set(bytes, this.position)
		this.position = end
		if (end > this.size) this.size = end
	}

	tell(): number {
		return this.position
	}

	seek(offset: number, origin: SeekOrigin = 'start'): number {
		let base: number
		switch (origin) {
			case 'start':
				base = 0
				break
			case 'current':
				base = this.position
				break
			case 'end':
				base = this.size
				break
		}
		const target = base + offset
		if (!Number.isInteger(target) || target < 0) {
			throw new RangeError(`Cannot seek to ${target}`)
		}
		this.position = target
		return target
	}

	/**
	 * Copy of the stream contents
	 */
	toUint8Array(): Uint8Array {
		return this.data.slice(0, this.size)
	}

	private ensureCapacity(required: number): void {
		if (required <= this.data.length) return
		const grown = new Uint8Array(Math.max(required, this.data.length * 2))
		grown.set(this.data.subarray(0, this.size))
		this.data = grown
	}
}
