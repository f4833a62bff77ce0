/**
 * Byte scrambling used by the firmware packager.
 *
 * Strings embedded in bundle headers and the whole payload that follows a header
 * are scrambled byte by byte: the two nibbles of each byte are swapped and the
 * result is XORed with a constant. Swapping nibbles maps 0x7A to 0xA7, which is
 * what makes the two directions below exact inverses.
 */

import { Transform, TransformCallback } from 'stream';

const SCRAMBLE_KEY = 0x7a;
const UNSCRAMBLE_KEY = 0xa7;

function swapNibbles(byte: number): number {
  return ((byte >> 4) | (byte << 4)) & 0xff;
}

export function scrambleByte(byte: number): number {
  return swapNibbles(byte) ^ SCRAMBLE_KEY;
}

export function unscrambleByte(byte: number): number {
  return swapNibbles(byte) ^ UNSCRAMBLE_KEY;
}

/**
 * Scrambles `data` in place and returns it.
 */
export function scrambleInPlace<T extends Uint8Array>(data: T): T {
  for (let i = 0; i < data.length; i++) {
    data[i] = scrambleByte(data[i]);
  }
  return data;
}

/**
 * Unscrambles `data` in place and returns it.
 */
export function unscrambleInPlace<T extends Uint8Array>(data: T): T {
  for (let i = 0; i < data.length; i++) {
    data[i] = unscrambleByte(data[i]);
  }
  return data;
}

function byteTransform(apply: (chunk: Buffer) => Buffer): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      // Copy so the caller's buffer is left untouched.
      callback(null, apply(Buffer.from(chunk)));
    },
  });
}

export function createScrambleStream(): Transform {
  return byteTransform(scrambleInPlace);
}

export function createUnscrambleStream(): Transform {
  return byteTransform(unscrambleInPlace);
}
