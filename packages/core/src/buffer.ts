/**
 * Growable byte buffer
 *
 * Keeps one backing array across uses: `reset()` empties it without giving
 * the memory back, so a scanner can refill the same storage for every
 * segment. Views returned by `view()` alias the backing array and are
 * invalidated by the next write or reset.
 */
export class ByteBuffer {
	private bytes: Uint8Array
	private size = 0

	constructor(capacity = 1024) {
		this.bytes = new Uint8Array(Math.max(capacity, 16))
	}

	get length(): number {
		return this.size
	}

	get capacity(): number {
		return this.bytes.length
	}

	reset(): void {
		this.size = 0
	}

	/**
	 * Make room for at least `capacity` bytes, doubling when growing
	 */
	reserve(capacity: number): void {
		if (capacity <= this.bytes.length) return
		const grown = new Uint8Array(Math.max(capacity, this.bytes.length * 2))
		grown.set(this.bytes.subarray(0, this.size))
		this.bytes = grown
	}

	push(byte: number): void {
		if (this.size === this.bytes.length) this.reserve(this.size + 1)
		this.bytes[this.size++] = byte
	}

	append(data: Uint8Array): void {
		this.reserve(this.size + data.length)
		this.bytes.set(data, this.size)
		this.size += data.length
	}

	/**
	 * Drop bytes from the end
	 */
	truncate(length: number): void {
		if (length < this.size) this.size = Math.max(length, 0)
	}

	/**
	 * Writable window of `length` bytes starting at the current end. The
	 * caller fills it and then calls `commit`.
	 */
	claim(length: number): Uint8Array {
		this.reserve(this.size + length)
		return this.bytes.subarray(this.size, this.size + length)
	}

	commit(length: number): void {
		this.size += length
	}

	view(): Uint8Array {
		return this.bytes.subarray(0, this.size)
	}

	toUint8Array(): Uint8Array {
		return this.bytes.slice(0, this.size)
	}
}
