const INITIAL_CAPACITY = 4096;

/**
 * FIFO accumulator of received bytes
 *
 * Bytes are appended at the tail by the receive loop and consumed from the
 * head by readers. Storage is one growable `Buffer` with a read offset, so
 * appends are amortised O(1) and consuming from the head only moves the
 * offset. Consumed space is reclaimed when the buffer drains or on growth.
 *
 * Pure framing helpers ({@link findTerminator}, {@link consumeExact}) never
 * report a pattern before all of its bytes have been appended.
 */
export class ByteBuffer {
  private storage: Buffer;
  private start = 0;
  private end = 0;

  constructor(capacity = INITIAL_CAPACITY) {
    this.storage = Buffer.allocUnsafe(capacity);
  }

  /**
   * Number of unread bytes
   */
  get length(): number {
    return this.end - this.start;
  }

  /**
   * Append bytes at the tail
   */
  append(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return;
    }
    this.reserve(bytes.length);
    this.storage.set(bytes, this.end);
    this.end += bytes.length;
  }

  /**
   * Offset of the first occurrence of `pattern`, not including the pattern
   * itself, or -1 when it is not (fully) present.
   *
   * @param fromIndex - Skip this many unread bytes before searching
   */
  findTerminator(pattern: Uint8Array, fromIndex = 0): number {
    if (pattern.length === 0) {
      return 0;
    }
    return this.view().indexOf(pattern, Math.max(0, fromIndex));
  }

  /**
   * Remove and return the first `n` bytes.
   *
   * Callers must have established `n <= length` beforehand.
   */
  consumeExact(n: number): Buffer {
    if (n > this.length) {
      throw new RangeError(`Cannot consume ${n} bytes, only ${this.length} buffered`);
    }
    const chunk = Buffer.from(this.storage.subarray(this.start, this.start + n));
    this.start += n;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
    return chunk;
  }

  /**
   * Remove and return everything buffered (possibly empty)
   */
  consumeAll(): Buffer {
    return this.consumeExact(this.length);
  }

  /**
   * Discard buffered bytes
   */
  reset(): void {
    this.start = 0;
    this.end = 0;
  }

  private view(): Buffer {
    return this.storage.subarray(this.start, this.end);
  }

  private reserve(extra: number): void {
    if (this.end + extra <= this.storage.length) {
      return;
    }

    const needed = this.length + extra;
    if (needed <= this.storage.length && this.start >= this.storage.length / 2) {
      // Enough room once consumed bytes are dropped
      this.storage.copy(this.storage, 0, this.start, this.end);
    } else {
      let capacity = Math.max(this.storage.length * 2, INITIAL_CAPACITY);
      while (capacity < needed) {
        capacity *= 2;
      }
      const grown = Buffer.allocUnsafe(capacity);
      this.storage.copy(grown, 0, this.start, this.end);
      this.storage = grown;
    }
    this.end = this.length;
    this.start = 0;
  }
}
