import { UpdateBundle } from '../types';

// 64-bit counters become decimal strings, byte blobs become hex.
function toPlain(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (Array.isArray(value)) return value.map(toPlain);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPlain(v)]));
  }
  return value;
}

export function report(bundle: UpdateBundle, filePath?: string) {
  return JSON.stringify({ file: filePath, bundle: toPlain(bundle) }, null, 2);
}
