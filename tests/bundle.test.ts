import { DEFAULT_LIMITS, decodeBundle, innermostBundle, isBundleMagic } from '../src/bundle';
import { RecursionLimitError, UnexpectedEndError, UnknownMagicError } from '../src/errors';
import { otaV1, otaV2, recoveryV1, signed } from './helpers/builders';
import { expectKind, thrownBy } from './helpers/assertions';

// tag + certificate id + reserved bytes
const ENVELOPE_PREFIX = 4 + 4 + 56;

describe('bundle dispatch', () => {
  test('recognises exactly the nine known tags', () => {
    for (const tag of ['SP01', 'FC02', 'FD03', 'FC04', 'FD04', 'FL01', 'FB01', 'FB02', 'FB03']) {
      expect(isBundleMagic(tag)).toBe(true);
    }
    expect(isBundleMagic('fc02')).toBe(false);
    expect(isBundleMagic('toString')).toBe(false);
  });

  test('fails on an unknown tag', () => {
    const error = thrownBy(() => decodeBundle(Buffer.from('ZZZZ' + '\0'.repeat(60), 'latin1')));
    expect(error).toBeInstanceOf(UnknownMagicError);
    expect(error).toMatchObject({ kind: 'UnknownMagic', tag: 'ZZZZ', offset: 0 });
  });

  test('fails on input shorter than a tag', () => {
    const error = thrownBy(() => decodeBundle(Buffer.from('FC')));
    expect(error).toBeInstanceOf(UnexpectedEndError);
    expect(error).toMatchObject({ offset: 0, requested: 4, available: 2 });
  });

  test('reads the shared shape for aliased OTA V2 tags', () => {
    for (const magic of ['FC04', 'FD04', 'FL01'] as const) {
      const bundle = decodeBundle(otaV2({ magic }));
      expect(bundle.kind).toBe('ota-v2');
      expect(bundle.magic).toBe(magic);
    }
  });
});

describe('signature envelope', () => {
  test('certificate 2 carries a 256 byte signature before the inner tag', () => {
    const bundle = decodeBundle(signed(2, otaV1({ sourceRevision: 9 })));
    const { envelope } = expectKind(bundle, 'signed');

    expect(envelope.certificateId).toBe(2);
    expect(envelope.certificate).toBe('Production 2K (pubprodkey02.pem)');
    expect(envelope.signature.length).toBe(256);
    expect(envelope.signature.every((b) => b === 0x5a)).toBe(true);

    const inner = expectKind(envelope.inner, 'ota-v1');
    expect(inner.offset).toBe(ENVELOPE_PREFIX + 256);
    expect(inner.header.sourceRevision).toBe(9);
  });

  test.each([0, 1, 5])('certificate %i carries a 128 byte signature', (certificateId) => {
    const { envelope } = expectKind(decodeBundle(signed(certificateId, otaV1())), 'signed');
    expect(envelope.signature.length).toBe(128);
    expect(envelope.inner.offset).toBe(ENVELOPE_PREFIX + 128);
  });

  test('labels an unrecognised certificate as Unknown', () => {
    const { envelope } = expectKind(decodeBundle(signed(5, otaV1())), 'signed');
    expect(envelope.certificate).toBe('Unknown');
  });

  test('certificate 2 with only a 128 byte signature runs out of data', () => {
    const bytes = signed(2, otaV1(), 128);
    const error = thrownBy(() => decodeBundle(bytes));
    expect(error).toBeInstanceOf(UnexpectedEndError);
    // 128 signature bytes + a 48 byte OTA V1 bundle remain after the prefix
    expect(error).toMatchObject({ offset: ENVELOPE_PREFIX, requested: 256, available: 176 });
  });

  test('nested envelopes unwrap to the innermost bundle', () => {
    const bytes = signed(0, signed(1, recoveryV1({ code: 0x0a, headerRevision: 2 }, 'FB02')));
    const bundle = decodeBundle(bytes);

    const outer = expectKind(bundle, 'signed');
    const middle = expectKind(outer.envelope.inner, 'signed');
    expect(middle.offset).toBe(ENVELOPE_PREFIX + 128);

    const inner = expectKind(innermostBundle(bundle), 'recovery-v1');
    expect(inner.magic).toBe('FB02');
    expect(inner.offset).toBe(2 * (ENVELOPE_PREFIX + 128));
    expect(inner.header.target).toMatchObject({ kind: 'platform', platform: { name: 'Zelda' } });
  });

  test('stops at the configured nesting depth', () => {
    const bytes = signed(0, signed(0, signed(0, otaV1())));
    expect(decodeBundle(bytes, { limits: { maxDepth: 3 } }).kind).toBe('signed');

    const error = thrownBy(() => decodeBundle(bytes, { limits: { maxDepth: 2 } }));
    expect(error).toBeInstanceOf(RecursionLimitError);
    expect(error).toMatchObject({ kind: 'RecursionLimitExceeded', offset: 2 * (ENVELOPE_PREFIX + 128), limit: 2 });
  });

  test('applies the default depth limit to forged envelope chains', () => {
    let bytes = otaV1();
    for (let i = 0; i <= DEFAULT_LIMITS.maxDepth; i++) {
      bytes = signed(0, bytes);
    }
    expect(() => decodeBundle(bytes)).toThrow(RecursionLimitError);
  });

  test('reports debug messages for each layer', () => {
    const messages: string[] = [];
    decodeBundle(signed(1, otaV1({ magic: 'FD03' })), { debug: (msg) => messages.push(msg) });
    expect(messages).toEqual([
      'SP01 (Signing Envelope) at offset 0, depth 0',
      'Signature envelope: certificate 1, 128-byte signature',
      'FD03 (Versionless [vls]) at offset 192, depth 1',
    ]);
  });
});
