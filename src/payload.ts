import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createDecodeContext, DecodeOptions, readBundle } from './bundle';
import { FieldReader } from './reader/field-reader';
import { BufferSource, ByteSource } from './reader/source';
import { UpdateBundle } from './types';
import { unscrambleInPlace } from './utils/scramble';

export const DEFAULT_CHUNK_SIZE = 8192;

export interface PayloadOptions extends DecodeOptions {
  chunkSize?: number;
}

export interface OpenedPayload {
  bundle: UpdateBundle;
  /** Absolute offset of the first payload byte. */
  headerLength: number;
  chunks: Generator<Buffer, void, void>;
}

export interface PayloadSummary {
  bundle: UpdateBundle;
  headerLength: number;
  bytesWritten: number;
}

function* unscrambledChunks(source: ByteSource, chunkSize: number): Generator<Buffer, void, void> {
  for (;;) {
    const chunk = source.read(chunkSize);
    if (chunk.length === 0) return;
    yield unscrambleInPlace(chunk);
  }
}

/**
 * Decodes the header so the source sits on the first payload byte, then
 * hands back the rest of the input as unscrambled chunks. Header errors are
 * thrown here, before anything has been read from the payload.
 */
export function openPayload(input: Uint8Array | ByteSource, options: PayloadOptions = {}): OpenedPayload {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Invalid chunk size: ${chunkSize}`);
  }
  const source = input instanceof Uint8Array ? new BufferSource(input) : input;
  const reader = new FieldReader(source);
  const bundle = readBundle(reader, createDecodeContext(options));
  const headerLength = reader.offset;
  options.debug?.(`Header ends at offset ${headerLength}; streaming payload in ${chunkSize}-byte chunks`);

  return { bundle, headerLength, chunks: unscrambledChunks(source, chunkSize) };
}

/**
 * Writes the unscrambled payload that follows the header to `sink`, one chunk
 * at a time. A sink factory is only called once the header has decoded.
 */
export async function extractPayload(
  input: Uint8Array | ByteSource,
  sink: Writable | (() => Writable),
  options: PayloadOptions = {},
): Promise<PayloadSummary> {
  const { bundle, headerLength, chunks } = openPayload(input, options);
  let bytesWritten = 0;

  const counted = Readable.from(
    (function* () {
      for (const chunk of chunks) {
        bytesWritten += chunk.length;
        yield chunk;
      }
    })(),
    { objectMode: false },
  );

  await pipeline(counted, typeof sink === 'function' ? sink() : sink);
  return { bundle, headerLength, bytesWritten };
}
