import { CodeResolver } from '../codes';
import { CountLimitError } from '../errors';
import { FieldReader } from '../reader/field-reader';
import { DecodeLimits, LabeledCode } from '../types';

export interface DecodeContext {
  resolver: CodeResolver;
  limits: DecodeLimits;
  /** Number of signature envelopes already entered. */
  depth: number;
  debug: (msg: string) => void;
}

/**
 * Reads an in-stream element count and rejects it before anything is allocated
 * for the elements.
 */
export function readCount(
  reader: FieldReader,
  field: string,
  width: 'u8' | 'u16le',
  ctx: DecodeContext,
): number {
  const offset = reader.offset;
  const count = width === 'u8' ? reader.u8() : reader.u16le();
  if (count > ctx.limits.maxCount) {
    throw new CountLimitError(offset, field, count, ctx.limits.maxCount);
  }
  return count;
}

export function readDeviceCodes(reader: FieldReader, count: number, ctx: DecodeContext): LabeledCode[] {
  const devices: LabeledCode[] = [];
  for (let i = 0; i < count; i++) {
    const code = reader.u16le();
    devices.push({ code, name: ctx.resolver.device(code) });
  }
  return devices;
}
