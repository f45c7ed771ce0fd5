import { CanonicalKey } from './reconcile.types';

export function canonicalKeyId(key: CanonicalKey): string {
  return JSON.stringify([key.model, key.style ?? null, key.blade, key.flex]);
}

export function describeKey(key: CanonicalKey): string {
  const style = key.style ? ` (${key.style})` : '';
  return `${key.model}${style} / ${key.blade} / ${key.flex}`;
}
