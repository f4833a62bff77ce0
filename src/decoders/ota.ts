import { FieldReader } from '../reader/field-reader';
import { OtaHeaderV1, OtaHeaderV2 } from '../types';
import { DecodeContext, readCount, readDeviceCodes } from './context';

/**
 * OTA V1 (FC02, FD03). Fixed size:
 *   [0..31]  scrambled md5 hex digest
 *   [32..35] u32 source revision
 *   [36..39] u32 target revision
 *   [40..41] u16 device code
 *   [42]     u8 optional flag
 *   [43]     padding
 */
export function decodeOtaV1(reader: FieldReader, ctx: DecodeContext): OtaHeaderV1 {
  const md5Hash = reader.hash();
  const sourceRevision = reader.u32le();
  const targetRevision = reader.u32le();
  const deviceCode = reader.u16le();
  const optional = reader.u8();
  const padding = reader.u8();

  return {
    md5Hash,
    sourceRevision,
    targetRevision,
    device: { code: deviceCode, name: ctx.resolver.device(deviceCode) },
    optional,
    padding,
  };
}

/**
 * OTA V2 (FC04, FD04, FL01). Variable size: a device list and a list of
 * scrambled `key=value` metadata strings, each with its own length prefix.
 */
export function decodeOtaV2(reader: FieldReader, ctx: DecodeContext): OtaHeaderV2 {
  const sourceRevision = reader.u64le();
  const targetRevision = reader.u64le();
  const deviceCount = readCount(reader, 'device count', 'u16le', ctx);
  const devices = readDeviceCodes(reader, deviceCount, ctx);
  const critical = reader.u8();
  const padding = reader.u8();
  const md5Hash = reader.hash();
  const metadataCount = readCount(reader, 'metadata count', 'u16le', ctx);

  const metadata: string[] = [];
  for (let i = 0; i < metadataCount; i++) {
    metadata.push(reader.prefixedString());
  }
  ctx.debug(`OTA V2 header: ${devices.length} device(s), ${metadata.length} metadata string(s)`);

  return { sourceRevision, targetRevision, devices, critical, padding, md5Hash, metadata };
}
