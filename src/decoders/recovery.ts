/**
 * Recovery ("fullbin") headers.
 *
 * Both shapes occupy a reserved region of RECOVERY_BLOCK_SIZE bytes that is
 * read in one go; fields are then taken from fixed offsets inside it
 * (all little-endian):
 *
 *   [4..11]  u64 target OTA
 *   [12..43] scrambled md5 hex digest
 *   [44..47] u32 magic 1
 *   [48..51] u32 magic 2
 *   [52..55] u32 minor
 *   [56..59] u32 device code (V1, rev != 2) or platform code
 *   [60..63] u32 header revision
 *   [64..67] u32 board
 *   [75]     u8 device count (V2 only)
 *   [76..]   u16 device codes (V2 only)
 */

import { FieldReader } from '../reader/field-reader';
import { BufferSource } from '../reader/source';
import { RecoveryHeaderV1, RecoveryHeaderV2, RecoveryTarget } from '../types';
import { DecodeContext, readCount, readDeviceCodes } from './context';

export const RECOVERY_BLOCK_SIZE = 131068;

const TARGET_OTA_OFFSET = 4;
const HASH_OFFSET = 12;
const CODE_OFFSET = 56;
const DEVICE_COUNT_OFFSET = 75;

/** Header revision at which the code field names a platform rather than a device. */
const PLATFORM_HEADER_REVISION = 2;

function readBlock(reader: FieldReader): FieldReader {
  const base = reader.offset;
  return new FieldReader(new BufferSource(reader.bytes(RECOVERY_BLOCK_SIZE), base));
}

export function decodeRecoveryV1(reader: FieldReader, ctx: DecodeContext): RecoveryHeaderV1 {
  const block = readBlock(reader);

  block.seek(TARGET_OTA_OFFSET);
  const targetOta = block.u64le();

  block.seek(HASH_OFFSET);
  const md5Hash = block.hash();
  const magic1 = block.u32le();
  const magic2 = block.u32le();
  const minor = block.u32le();

  block.seek(CODE_OFFSET);
  const deviceOrPlatform = block.u32le();
  const headerRevision = block.u32le();
  const board = block.u32le();

  if (headerRevision === PLATFORM_HEADER_REVISION) {
    const target: RecoveryTarget = {
      kind: 'platform',
      platform: { code: deviceOrPlatform, name: ctx.resolver.platform(deviceOrPlatform) },
      board,
    };
    return { md5Hash, magic1, magic2, minor, headerRevision, target, targetOta };
  }

  const deviceCode = deviceOrPlatform & 0xffff;
  ctx.debug(`Recovery V1 header revision ${headerRevision}: reading device code 0x${deviceCode.toString(16)}`);
  return {
    md5Hash,
    magic1,
    magic2,
    minor,
    headerRevision,
    target: { kind: 'device', device: { code: deviceCode, name: ctx.resolver.device(deviceCode) } },
  };
}

export function decodeRecoveryV2(reader: FieldReader, ctx: DecodeContext): RecoveryHeaderV2 {
  const block = readBlock(reader);

  block.seek(TARGET_OTA_OFFSET);
  const targetOta = block.u64le();
  const md5Hash = block.hash();
  const magic1 = block.u32le();
  const magic2 = block.u32le();
  const minor = block.u32le();
  const platformCode = block.u32le();
  const headerRevision = block.u32le();
  const board = block.u32le();

  block.seek(DEVICE_COUNT_OFFSET);
  const deviceCount = readCount(block, 'device count', 'u8', ctx);
  const devices = readDeviceCodes(block, deviceCount, ctx);

  return {
    targetOta,
    md5Hash,
    magic1,
    magic2,
    minor,
    platform: { code: platformCode, name: ctx.resolver.platform(platformCode) },
    headerRevision,
    board,
    devices,
  };
}
