const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

/**
 * 32-bit FNV-1a over the UTF-8 bytes of `input`, as an unsigned integer.
 * Stable across processes and platforms.
 *
 * @example
 * fnv1a32('a') // => 0xe40c292c
 */
export function fnv1a32(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of encoder.encode(input)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}
