import * as fs from 'fs';
import { SeekOutOfRangeError } from '../errors';

/**
 * Synchronous, positioned input. `read` returns fewer bytes than asked for
 * only when the data is exhausted.
 */
export interface ByteSource {
  /** Current position, relative to the start of this source. */
  readonly position: number;
  /** Absolute offset of this source's first byte within the original input. */
  readonly base: number;
  read(length: number): Buffer;
  seek(offset: number): void;
}

export class BufferSource implements ByteSource {
  private pos = 0;

  constructor(
    private readonly buffer: Uint8Array,
    readonly base = 0,
  ) {}

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.buffer.length;
  }

  read(length: number): Buffer {
    const end = Math.min(this.pos + length, this.buffer.length);
    // Copies, so callers may transform what they get back in place.
    const out = Buffer.from(this.buffer.subarray(this.pos, end));
    this.pos = end;
    return out;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buffer.length) {
      throw new SeekOutOfRangeError(this.base + this.pos, this.base + offset);
    }
    this.pos = offset;
  }
}

/**
 * Reads straight from a file descriptor so that large payloads never have to
 * be held in memory.
 */
export class FileSource implements ByteSource {
  readonly base = 0;
  private pos = 0;
  private readonly size: number;

  private constructor(private readonly fd: number) {
    this.size = fs.fstatSync(fd).size;
  }

  static open(filePath: string): FileSource {
    return new FileSource(fs.openSync(filePath, 'r'));
  }

  get position(): number {
    return this.pos;
  }

  read(length: number): Buffer {
    const out = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const n = fs.readSync(this.fd, out, filled, length - filled, this.pos + filled);
      if (n === 0) break;
      filled += n;
    }
    this.pos += filled;
    return filled === length ? out : out.subarray(0, filled);
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.size) {
      throw new SeekOutOfRangeError(this.pos, offset);
    }
    this.pos = offset;
  }

  close(): void {
    fs.closeSync(this.fd);
  }
}
