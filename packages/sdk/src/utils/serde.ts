export function hexFromU8a(u8a: Uint8Array): string {
  return "0x" + Array.from(u8a).map(b => b.toString(16).padStart(2, "0")).join("");
}
export function u8aFromBase64(b64: string): Uint8Array {
  return new Uint8Array(Buffer.from(b64, "base64"));
}
export function base64FromU8a(u8a: Uint8Array): string {
  return Buffer.from(u8a.buffer, u8a.byteOffset, u8a.byteLength).toString("base64");
}
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return concatAll(parts);
}
/** Array form of concatBytes for part lists too long to spread into a call */
export function concatAll(parts: readonly Uint8Array[]): Uint8Array {
  const total = new Uint8Array(parts.reduce((acc, p) => acc + p.length, 0));
  let pos = 0;
  for (const p of parts) { total.set(p, pos); pos += p.length; }
  return total;
}
export function u32le(x: number): Uint8Array {
  const b = new Uint8Array(4);
  new DataView(b.buffer).setUint32(0, x, true);
  return b;
}
