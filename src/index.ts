export {
  decodeBundle,
  readBundle,
  createDecodeContext,
  innermostBundle,
  isBundleMagic,
  BUNDLE_DESCRIPTIONS,
  DEFAULT_LIMITS,
} from './bundle';
export type { DecodeOptions } from './bundle';
export type { DecodeContext } from './decoders/context';
export { RECOVERY_BLOCK_SIZE } from './decoders/recovery';
export { signatureLength } from './decoders/signature';
export { openPayload, extractPayload, DEFAULT_CHUNK_SIZE } from './payload';
export type { PayloadOptions, OpenedPayload, PayloadSummary } from './payload';
export { FieldReader } from './reader/field-reader';
export { BufferSource, FileSource } from './reader/source';
export type { ByteSource } from './reader/source';
export { TableCodeResolver, getDefaultResolver, resolveDataDir, UNKNOWN } from './codes';
export type { CodeResolver } from './codes';
export * from './errors';
export * from './types';
export {
  scrambleByte,
  unscrambleByte,
  scrambleInPlace,
  unscrambleInPlace,
  createScrambleStream,
  createUnscrambleStream,
} from './utils/scramble';
export { loadConfig, defaultConfig } from './config';
export type { EreaderFwConfig } from './config';
