import { DecodeError } from './errors';

/** Default bound on list/dictionary nesting while decoding. */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Read cursor over an immutable byte sequence.
 * Tracks the current offset and the container nesting depth.
 */
export class ByteReader {
  private readonly _data: Uint8Array;
  private readonly _maxDepth: number;
  private _offset: number;
  private _depth: number;

  private constructor(data: Uint8Array, maxDepth: number) {
    this._data = data;
    this._maxDepth = maxDepth;
    this._offset = 0;
    this._depth = 0;
  }

  /** Wrap bytes for reading. The bytes are not copied. */
  static from(data: Uint8Array, maxDepth = DEFAULT_MAX_DEPTH): ByteReader {
    return new ByteReader(data, maxDepth);
  }

  /** Total number of bytes. */
  get length(): number {
    return this._data.length;
  }

  /** Current cursor position. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  get atEnd(): boolean {
    return this._offset >= this._data.length;
  }

  /** Current container nesting depth. */
  get depth(): number {
    return this._depth;
  }

  /** Byte at the cursor without consuming it. */
  peek(): number {
    if (this.atEnd) {
      throw new Error('ByteReader: read past end of buffer');
    }
    return this._data[this._offset];
  }

  /** Position of the next `byte` at or after `from`, or -1. */
  indexOf(byte: number, from = this._offset): number {
    return this._data.indexOf(byte, from);
  }

  /** Copy `count` bytes starting at the cursor and advance past them. */
  read(count: number): Uint8Array {
    if (count < 0 || count > this.remaining) {
      throw new Error(`ByteReader: cannot read ${count} bytes, ${this.remaining} remaining`);
    }
    const result = this._data.slice(this._offset, this._offset + count);
    this._offset += count;
    return result;
  }

  /** Copy the bytes in [start, end) without moving the cursor. */
  slice(start: number, end: number): Uint8Array {
    return this._data.slice(start, end);
  }

  /** Advance the cursor by `count` bytes. */
  skip(count = 1): void {
    this.seek(this._offset + count);
  }

  /** Seek to an absolute offset. */
  seek(offset: number): void {
    if (offset < 0 || offset > this._data.length) {
      throw new Error(`seek: offset ${offset} out of range [0, ${this._data.length}]`);
    }
    this._offset = offset;
  }

  /** Enter a list or dictionary. */
  descend(): void {
    if (this._depth >= this._maxDepth) {
      throw new DecodeError(
        'NestingTooDeep',
        `nesting deeper than ${this._maxDepth} levels`,
        this._offset,
      );
    }
    this._depth++;
  }

  /** Leave a list or dictionary. */
  ascend(): void {
    this._depth--;
  }
}
