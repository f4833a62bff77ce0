export type BundleErrorKind =
  | 'UnexpectedEnd'
  | 'SeekOutOfRange'
  | 'UnknownMagic'
  | 'RecursionLimitExceeded'
  | 'CountLimitExceeded';

/**
 * Base class for every failure raised while decoding a bundle.
 * `offset` is the absolute byte position in the input where decoding stopped.
 */
export class BundleError extends Error {
  constructor(
    readonly kind: BundleErrorKind,
    readonly offset: number,
    message: string,
  ) {
    super(`${message} (at offset ${offset}, 0x${offset.toString(16).toUpperCase()})`);
    this.name = 'BundleError';
  }
}

export class UnexpectedEndError extends BundleError {
  constructor(
    offset: number,
    readonly requested: number,
    readonly available: number,
  ) {
    super('UnexpectedEnd', offset, `Unexpected end of data: needed ${requested} bytes, ${available} available`);
    this.name = 'UnexpectedEndError';
  }
}

export class SeekOutOfRangeError extends BundleError {
  constructor(
    offset: number,
    readonly target: number,
  ) {
    super('SeekOutOfRange', offset, `Cannot seek to offset ${target}`);
    this.name = 'SeekOutOfRangeError';
  }
}

export class UnknownMagicError extends BundleError {
  constructor(
    offset: number,
    readonly tag: string,
  ) {
    super('UnknownMagic', offset, `Unknown bundle magic ${JSON.stringify(tag)}`);
    this.name = 'UnknownMagicError';
  }
}

export class RecursionLimitError extends BundleError {
  constructor(
    offset: number,
    readonly limit: number,
  ) {
    super('RecursionLimitExceeded', offset, `Signature envelopes nested deeper than ${limit} levels`);
    this.name = 'RecursionLimitError';
  }
}

export class CountLimitError extends BundleError {
  constructor(
    offset: number,
    readonly field: string,
    readonly count: number,
    readonly limit: number,
  ) {
    super('CountLimitExceeded', offset, `${field} of ${count} exceeds the limit of ${limit}`);
    this.name = 'CountLimitError';
  }
}
