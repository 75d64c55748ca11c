/** Fixed-width little-endian bytes; caller guarantees 0 <= x < 2^(8*width) */
export function leBytes(x: bigint, width = 32): Uint8Array {
  const out = new Uint8Array(width);
  let v = x;
  for (let i = 0; i < width; i++) { out[i] = Number(v & 0xffn); v >>= 8n; }
  return out;
}

export function fromLeBytes(bytes: Uint8Array): bigint {
  let v = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) v = (v << 8n) | BigInt(bytes[i] ?? 0);
  return v;
}

export function u64le(x: number | bigint): Uint8Array {
  return leBytes(BigInt(x), 8);
}

export function mod(a: bigint, p: bigint): bigint {
  const r = a % p;
  return r < 0n ? r + p : r;
}
