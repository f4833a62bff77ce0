import { BundleKind, UpdateBundle } from '../../src/types';

/** Runs `fn` and returns what it threw; fails the test if nothing was thrown. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('Expected the call to throw');
}

/** Narrows a decoded bundle to `kind`, failing the test otherwise. */
export function expectKind<K extends BundleKind>(bundle: UpdateBundle, kind: K): Extract<UpdateBundle, { kind: K }> {
  const actual: string = bundle.kind;
  const isKind = (b: UpdateBundle): b is Extract<UpdateBundle, { kind: K }> => b.kind === kind;
  if (!isKind(bundle)) {
    throw new Error(`Expected a ${kind} bundle, got ${actual}`);
  }
  return bundle;
}
