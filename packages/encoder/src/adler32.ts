const MOD_ADLER = 65521;
/** Largest run before the sums must be reduced to stay exact in doubles. */
const NMAX = 5552;

export function adler32(data: Uint8Array): number {
  let a = 1;
  let b = 0;
  let offset = 0;
  while (offset < data.length) {
    const end = Math.min(offset + NMAX, data.length);
    for (; offset < end; offset += 1) {
      a += data[offset] ?? 0;
      b += a;
    }
    a %= MOD_ADLER;
    b %= MOD_ADLER;
  }
  return ((b << 16) | a) >>> 0;
}
