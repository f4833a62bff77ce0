/** A raw code from the header together with its resolved display name. */
export interface LabeledCode {
    code: number;
    name: string;
}

export interface OtaHeaderV1 {
    md5Hash: string;
    sourceRevision: number;
    targetRevision: number;
    device: LabeledCode;
    optional: number;
    padding: number;
}

export interface OtaHeaderV2 {
    sourceRevision: bigint;
    targetRevision: bigint;
    devices: LabeledCode[];
    critical: number;
    padding: number;
    md5Hash: string;
    metadata: string[];
}

/** Recovery V1 headers name either a single device or a platform/board pair. */
export type RecoveryTarget =
    | { kind: 'device'; device: LabeledCode }
    | { kind: 'platform'; platform: LabeledCode; board: number };

export interface RecoveryHeaderV1 {
    md5Hash: string;
    magic1: number;
    magic2: number;
    minor: number;
    headerRevision: number;
    target: RecoveryTarget;
    /** Present only when `headerRevision` is 2. */
    targetOta?: bigint;
}

export interface RecoveryHeaderV2 {
    targetOta: bigint;
    md5Hash: string;
    magic1: number;
    magic2: number;
    minor: number;
    platform: LabeledCode;
    headerRevision: number;
    board: number;
    devices: LabeledCode[];
}

export interface SignatureEnvelope {
    certificateId: number;
    certificate: string;
    signature: Buffer;
    inner: UpdateBundle;
}

export type SignedMagic = 'SP01';
export type OtaV1Magic = 'FC02' | 'FD03';
export type OtaV2Magic = 'FC04' | 'FD04' | 'FL01';
export type RecoveryV1Magic = 'FB01' | 'FB02';
export type RecoveryV2Magic = 'FB03';
export type BundleMagic = SignedMagic | OtaV1Magic | OtaV2Magic | RecoveryV1Magic | RecoveryV2Magic;

interface BundleBase<M extends BundleMagic> {
    magic: M;
    /** Absolute offset of the magic tag in the input. */
    offset: number;
}

export type UpdateBundle =
    | (BundleBase<SignedMagic> & { kind: 'signed'; envelope: SignatureEnvelope })
    | (BundleBase<OtaV1Magic> & { kind: 'ota-v1'; header: OtaHeaderV1 })
    | (BundleBase<OtaV2Magic> & { kind: 'ota-v2'; header: OtaHeaderV2 })
    | (BundleBase<RecoveryV1Magic> & { kind: 'recovery-v1'; header: RecoveryHeaderV1 })
    | (BundleBase<RecoveryV2Magic> & { kind: 'recovery-v2'; header: RecoveryHeaderV2 });

export type BundleKind = UpdateBundle['kind'];

export interface DecodeLimits {
    /** Maximum number of nested signature envelopes. */
    maxDepth: number;
    /** Maximum value accepted for an in-stream device or metadata count. */
    maxCount: number;
}
