/**
 * Sequential big-endian reader over a frame. Reads past the end return null
 * and leave the offset untouched, so callers decide the default per field.
 */
export class ByteReader {
  private cursor: number;

  constructor(private readonly buffer: Buffer, start: number = 0) {
    this.cursor = start;
  }

  get offset(): number {
    return this.cursor;
  }

  get remaining(): number {
    return Math.max(0, this.buffer.length - this.cursor);
  }

  has(length: number): boolean {
    return this.remaining >= length;
  }

  take(length: number): Buffer | null {
    if (!this.has(length)) return null;
    const slice = this.buffer.subarray(this.cursor, this.cursor + length);
    this.cursor += length;
    return slice;
  }

  u8(): number | null {
    if (!this.has(1)) return null;
    return this.buffer.readUInt8(this.cursor++);
  }

  u16(): number | null {
    const bytes = this.take(2);
    return bytes ? bytes.readUInt16BE(0) : null;
  }

  u24(): number | null {
    const bytes = this.take(3);
    return bytes ? bytes.readUIntBE(0, 3) : null;
  }

  u32(): number | null {
    const bytes = this.take(4);
    return bytes ? bytes.readUInt32BE(0) : null;
  }

  /** Decodes a fixed-width field with `decode`, or null when the frame is short. */
  field<T>(length: number, decode: (bytes: Buffer) => T): T | null {
    const bytes = this.take(length);
    return bytes ? decode(bytes) : null;
  }
}
