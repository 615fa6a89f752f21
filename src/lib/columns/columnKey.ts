/**
 * Column keys: the case-, space-, underscore- and hyphen-insensitive form of a
 * header or placeholder name. "Phone Number", "phone_number" and
 * "PHONE-NUMBER" all become "phonenumber".
 */

const KEY_CACHE_SIZE = 256;
const keyCache = new Map<string, string>();

export function makeKey(originalKey: string): string;
export function makeKey(originalKey: string | null): string | null;
export function makeKey(originalKey: string | null): string | null {
  if (originalKey === null) return null;

  const hit = keyCache.get(originalKey);
  if (hit !== undefined) return hit;

  const key = originalKey.toLowerCase().replace(/[ _-]/g, "");

  if (keyCache.size >= KEY_CACHE_SIZE) {
    const oldest = keyCache.keys().next();
    if (!oldest.done) keyCache.delete(oldest.value);
  }
  keyCache.set(originalKey, key);
  return key;
}
