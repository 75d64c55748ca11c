import { createHash } from "node:crypto";
import type { Transcript } from "./api.js";
import { concatBytes, u32le } from "../utils/serde.js";

const enc = new TextEncoder();

/** Hash the parts in order; a nested list (e.g. assignment values) is fed entry by entry. */
export function sha256(...parts: (Uint8Array | readonly Uint8Array[])[]): Uint8Array {
  const h = createHash("sha256");
  for (const p of parts) {
    if (p instanceof Uint8Array) h.update(p);
    else for (const q of p) h.update(q);
  }
  return new Uint8Array(h.digest());
}

// Length-prefix every label and message so distinct sequences never collide.
function framed(label: string, message: Uint8Array): Uint8Array {
  const l = enc.encode(label);
  return concatBytes(u32le(l.length), l, u32le(message.length), message);
}

/** SHA-256 hash-chain transcript. */
export class HashTranscript implements Transcript {
  private state: Uint8Array;

  constructor(label: Uint8Array) {
    this.state = sha256(framed("dom-sep", label));
  }

  appendMessage(label: string, message: Uint8Array): void {
    this.state = sha256(this.state, framed(label, message));
  }

  challengeBytes(label: string, length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let block = 0, pos = 0; pos < length; block++, pos += 32) {
      const chunk = sha256(this.state, framed(label, u32le(block)));
      out.set(chunk.subarray(0, Math.min(32, length - pos)), pos);
    }
    this.state = sha256(this.state, framed(label, out));
    return out;
  }
}
