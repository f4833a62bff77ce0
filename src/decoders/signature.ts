import { FieldReader } from '../reader/field-reader';
import { SignatureEnvelope, UpdateBundle } from '../types';
import { DecodeContext } from './context';

const RESERVED_LENGTH = 56;
const SIGNATURE_LENGTH_2K = 256;
const SIGNATURE_LENGTH_1K = 128;

export function signatureLength(certificateId: number): number {
  return certificateId === 2 ? SIGNATURE_LENGTH_2K : SIGNATURE_LENGTH_1K;
}

/**
 * SP01 envelope: u32 certificate id, 56 reserved bytes, the signature, then
 * one complete nested bundle. The signature is kept as-is and never verified.
 */
export function decodeSignatureEnvelope(
  reader: FieldReader,
  ctx: DecodeContext,
  decodeNested: (reader: FieldReader, ctx: DecodeContext) => UpdateBundle,
): SignatureEnvelope {
  const certificateId = reader.u32le();
  reader.skip(RESERVED_LENGTH);
  const signature = reader.bytes(signatureLength(certificateId));
  ctx.debug(`Signature envelope: certificate ${certificateId}, ${signature.length}-byte signature`);

  const inner = decodeNested(reader, { ...ctx, depth: ctx.depth + 1 });

  return {
    certificateId,
    certificate: ctx.resolver.certificate(certificateId),
    signature,
    inner,
  };
}
