import { nanoid } from 'nanoid';

export type IdPrefix = 'ses' | 'th' | 'br' | 'xref' | 'cp' | 'snap' | 'tl' | 'node' | 'cf';

/** Opaque record identifier such as `br_V1StGXR8_Z5j`. */
export function newId(prefix: IdPrefix): string {
  return `${prefix}_${nanoid(12)}`;
}
