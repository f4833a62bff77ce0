import { UnexpectedEndError } from '../errors';
import { unscrambleInPlace } from '../utils/scramble';
import { ByteSource } from './source';

export const HASH_LENGTH = 32;
export const TAG_LENGTH = 4;

/**
 * Fixed-width and string field reads on top of a {@link ByteSource}.
 * Every read either returns the full field or throws {@link UnexpectedEndError}.
 */
export class FieldReader {
  constructor(readonly source: ByteSource) {}

  /** Absolute offset in the original input, used for diagnostics. */
  get offset(): number {
    return this.source.base + this.source.position;
  }

  get position(): number {
    return this.source.position;
  }

  seek(offset: number): void {
    this.source.seek(offset);
  }

  bytes(length: number): Buffer {
    const start = this.offset;
    const data = this.source.read(length);
    if (data.length < length) {
      throw new UnexpectedEndError(start, length, data.length);
    }
    return data;
  }

  skip(length: number): void {
    this.bytes(length);
  }

  u8(): number {
    return this.bytes(1).readUInt8(0);
  }

  u16le(): number {
    return this.bytes(2).readUInt16LE(0);
  }

  u16be(): number {
    return this.bytes(2).readUInt16BE(0);
  }

  u32le(): number {
    return this.bytes(4).readUInt32LE(0);
  }

  u64le(): bigint {
    return this.bytes(8).readBigUInt64LE(0);
  }

  /** Four raw bytes as an ASCII tag. */
  tag(): string {
    return this.bytes(TAG_LENGTH).toString('latin1');
  }

  /** 32 scrambled bytes holding a hex digest. Invalid UTF-8 is replaced, not rejected. */
  hash(): string {
    return unscrambleInPlace(this.bytes(HASH_LENGTH)).toString('utf8');
  }

  /** A big-endian 16-bit length followed by that many scrambled bytes. */
  prefixedString(): string {
    const length = this.u16be();
    return unscrambleInPlace(this.bytes(length)).toString('utf8');
  }
}
