/**
 * Forward-only cursor over a byte array with a single mark.
 * Enough lookahead for frame detection without a seekable stream.
 */
export class ByteCursor {
  private readonly bytes: Uint8Array;
  private offset = 0;
  private marked = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  /**
   * Remember the current position for a later reset().
   */
  mark(): void {
    this.marked = this.offset;
  }

  /**
   * Rewind to the last mark (the start of the input if never marked).
   */
  reset(): void {
    this.offset = this.marked;
  }

  /**
   * Read one byte, or -1 at the end of the input.
   */
  readByte(): number {
    const value = this.bytes[this.offset];
    if (value === undefined) {
      return -1;
    }
    this.offset++;
    return value;
  }

  /**
   * Look at the next byte without consuming it, or -1 at the end.
   */
  peekByte(): number {
    return this.bytes[this.offset] ?? -1;
  }

  /**
   * Read exactly `length` bytes. Returns undefined (consuming nothing)
   * when fewer remain.
   */
  read(length: number): Uint8Array | undefined {
    if (length < 0 || length > this.remaining) {
      return undefined;
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  /**
   * True when the bytes at the cursor equal `sequence`. Consumes nothing.
   */
  matches(sequence: Uint8Array): boolean {
    if (sequence.length > this.remaining) {
      return false;
    }
    for (let i = 0; i < sequence.length; i++) {
      if (this.bytes[this.offset + i] !== sequence[i]) {
        return false;
      }
    }
    return true;
  }

  skip(length: number): void {
    this.offset = Math.min(this.bytes.length, this.offset + length);
  }
}
