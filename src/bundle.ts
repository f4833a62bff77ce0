import { CodeResolver, getDefaultResolver } from './codes';
import { DecodeContext } from './decoders/context';
import { decodeOtaV1, decodeOtaV2 } from './decoders/ota';
import { decodeRecoveryV1, decodeRecoveryV2 } from './decoders/recovery';
import { decodeSignatureEnvelope } from './decoders/signature';
import { RecursionLimitError, UnknownMagicError } from './errors';
import { FieldReader } from './reader/field-reader';
import { BufferSource, ByteSource } from './reader/source';
import {
  BundleMagic,
  DecodeLimits,
  OtaV1Magic,
  OtaV2Magic,
  RecoveryV1Magic,
  RecoveryV2Magic,
  UpdateBundle,
} from './types';

export const DEFAULT_LIMITS: DecodeLimits = {
  maxDepth: 8,
  maxCount: 4096,
};

export interface DecodeOptions {
  resolver?: CodeResolver;
  limits?: Partial<DecodeLimits>;
  debug?: (msg: string) => void;
}

export const BUNDLE_DESCRIPTIONS: Record<BundleMagic, string> = {
  SP01: 'Signing Envelope',
  FC02: 'OTA [ota]',
  FD03: 'Versionless [vls]',
  FC04: 'OTA [ota]',
  FD04: 'Versionless [vls]',
  FL01: 'Language [lang]',
  FB01: 'Fullbin',
  FB02: 'Fullbin',
  FB03: 'Fullbin [OTA?, fwo?]',
};

type BundleDecoder = (reader: FieldReader, ctx: DecodeContext, offset: number) => UpdateBundle;

const signed: BundleDecoder = (reader, ctx, offset) => {
  if (ctx.depth >= ctx.limits.maxDepth) {
    throw new RecursionLimitError(offset, ctx.limits.maxDepth);
  }
  return {
    kind: 'signed',
    magic: 'SP01',
    offset,
    envelope: decodeSignatureEnvelope(reader, ctx, readBundle),
  };
};

const otaV1 =
  (magic: OtaV1Magic): BundleDecoder =>
  (reader, ctx, offset) => ({ kind: 'ota-v1', magic, offset, header: decodeOtaV1(reader, ctx) });

const otaV2 =
  (magic: OtaV2Magic): BundleDecoder =>
  (reader, ctx, offset) => ({ kind: 'ota-v2', magic, offset, header: decodeOtaV2(reader, ctx) });

const recoveryV1 =
  (magic: RecoveryV1Magic): BundleDecoder =>
  (reader, ctx, offset) => ({ kind: 'recovery-v1', magic, offset, header: decodeRecoveryV1(reader, ctx) });

const recoveryV2 =
  (magic: RecoveryV2Magic): BundleDecoder =>
  (reader, ctx, offset) => ({ kind: 'recovery-v2', magic, offset, header: decodeRecoveryV2(reader, ctx) });

const DECODERS: Record<BundleMagic, BundleDecoder> = {
  SP01: signed,
  FC02: otaV1('FC02'),
  FD03: otaV1('FD03'),
  FC04: otaV2('FC04'),
  FD04: otaV2('FD04'),
  FL01: otaV2('FL01'),
  FB01: recoveryV1('FB01'),
  FB02: recoveryV1('FB02'),
  FB03: recoveryV2('FB03'),
};

export function isBundleMagic(tag: string): tag is BundleMagic {
  return Object.prototype.hasOwnProperty.call(DECODERS, tag);
}

export function createDecodeContext(options: DecodeOptions = {}): DecodeContext {
  return {
    resolver: options.resolver ?? getDefaultResolver(),
    limits: { ...DEFAULT_LIMITS, ...options.limits },
    depth: 0,
    debug: options.debug ?? (() => undefined),
  };
}

/**
 * Reads one bundle starting at the reader's current position. The tag is
 * consumed whether or not it is recognised.
 */
export function readBundle(reader: FieldReader, ctx: DecodeContext): UpdateBundle {
  const offset = reader.offset;
  const tag = reader.tag();
  if (!isBundleMagic(tag)) {
    throw new UnknownMagicError(offset, tag);
  }
  ctx.debug(`${tag} (${BUNDLE_DESCRIPTIONS[tag]}) at offset ${offset}, depth ${ctx.depth}`);
  return DECODERS[tag](reader, ctx, offset);
}

export function decodeBundle(input: Uint8Array | ByteSource, options?: DecodeOptions): UpdateBundle {
  const source = input instanceof Uint8Array ? new BufferSource(input) : input;
  return readBundle(new FieldReader(source), createDecodeContext(options));
}

/** Follows signature envelopes down to the bundle they ultimately wrap. */
export function innermostBundle(bundle: UpdateBundle): UpdateBundle {
  let current = bundle;
  while (current.kind === 'signed') {
    current = current.envelope.inner;
  }
  return current;
}
