// FNV-1a 32-bit, used to fingerprint recorded traces
export function fnv1a32(bytes: ArrayLike<number>, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash >>> 0, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

// Feeds each 32-bit word little-endian, so fnv1a32Words([w]) equals hashing its four bytes.
export function fnv1a32Words(words: ArrayLike<number>): number {
  let hash = 0x811c9dc5;
  const buf = [0, 0, 0, 0];
  for (let i = 0; i < words.length; i++) {
    const w = words[i] >>> 0;
    buf[0] = w & 0xff;
    buf[1] = (w >>> 8) & 0xff;
    buf[2] = (w >>> 16) & 0xff;
    buf[3] = (w >>> 24) & 0xff;
    hash = fnv1a32(buf, hash);
  }
  return hash;
}

export function toHex32(h: number): string {
  return ('00000000' + (h >>> 0).toString(16)).slice(-8);
}

export function fnv1aHex(bytes: ArrayLike<number>): string {
  return toHex32(fnv1a32(bytes));
}
