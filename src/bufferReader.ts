import { TruncatedInputError } from "./errors";

/**
 * Manages reading LE data from buffer and tracking offset position
 *
 * Reads never go past the end of the buffer: a short read throws
 * TruncatedInputError and leaves the position where it was.
 */
export class BufferReader {
  private pos = 0;
  constructor(private readonly buffer: Buffer) {}

  public readByte(): number {
    this.ensure(1);
    return this.buffer.readUInt8(this.pos++);
  }

  /** u16 */
  public readWord(): number {
    this.ensure(2);
    const value = this.buffer.readUInt16LE(this.pos);
    this.pos += 2;
    return value;
  }

  /** u32 */
  public readLong(): number {
    this.ensure(4);
    const value = this.buffer.readUInt32LE(this.pos);
    this.pos += 4;
    return value;
  }

  public readInt32(): number {
    this.ensure(4);
    const value = this.buffer.readInt32LE(this.pos);
    this.pos += 4;
    return value;
  }

  public readBytes(length: number): Buffer {
    this.ensure(length);
    const slice = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  /**
   * Name field: length byte followed by that many raw bytes.
   * Returns a copy so the model doesn't pin the file contents.
   */
  public readName(): Buffer {
    const start = this.pos;
    const length = this.readByte();
    try {
      return Buffer.from(this.readBytes(length));
    } catch (err) {
      this.pos = start;
      throw err;
    }
  }

  public skip(bytes: number) {
    this.ensure(bytes);
    this.pos += bytes;
  }

  public seek(offset: number) {
    if (offset < 0 || offset > this.buffer.length) {
      throw new RangeError(`Offset ${offset} outside buffer`);
    }
    this.pos = offset;
  }

  public remaining(): number {
    return this.buffer.length - this.pos;
  }

  public finished(): boolean {
    return this.pos >= this.buffer.length;
  }

  public offset(): number {
    return this.pos;
  }

  public length(): number {
    return this.buffer.length;
  }

  private ensure(bytes: number) {
    const available = this.remaining();
    if (bytes > available) {
      throw new TruncatedInputError(this.pos, bytes, available);
    }
  }
}
