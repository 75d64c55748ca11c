import { createDigestBackend, encodePublicInputs, isSDKError, serializeWitness } from "../src/index.js";
import type { R1CSDefinition } from "../src/index.js";

export const backend = createDigestBackend();

/**
 * x^3 + x + 5 = y, vars (x, x^2, x^3), one public input y.
 * Columns: 0..2 vars, 3 constant one, 4 input.
 */
export const CUBIC: R1CSDefinition = {
  numCons: 3,
  numVars: 3,
  numInputs: 1,
  A: [
    { row: 0, col: 0, value: 1n },
    { row: 1, col: 1, value: 1n },
    { row: 2, col: 2, value: 1n },
    { row: 2, col: 0, value: 1n },
    { row: 2, col: 3, value: 5n },
  ],
  B: [
    { row: 0, col: 0, value: 1n },
    { row: 1, col: 0, value: 1n },
    { row: 2, col: 3, value: 1n },
  ],
  C: [
    { row: 0, col: 1, value: 1n },
    { row: 1, col: 2, value: 1n },
    { row: 2, col: 4, value: 1n },
  ],
};

export function cubicCase(x = 3n) {
  return {
    circuit: backend.encodeInstance(CUBIC),
    witness: serializeWitness([x, x * x, x * x * x]),
    publicInputs: encodePublicInputs([x * x * x + x + 5n]),
  };
}

export function u32At(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const out = Uint8Array.from(bytes);
  new DataView(out.buffer).setUint32(offset, value, true);
  return out;
}

export function u64At(bytes: Uint8Array, offset: number, value: bigint): Uint8Array {
  const out = Uint8Array.from(bytes);
  new DataView(out.buffer).setBigUint64(offset, value, true);
  return out;
}

/** Expect `fn` to throw an SDKError and return its code. */
export function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (isSDKError(e)) return e.code;
    throw e;
  }
  throw new Error("expected an error");
}
