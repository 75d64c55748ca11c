import type { ProofBackend } from "../backend/api.js";
import { DEFAULT_WITNESS_FORMAT, WitnessFormat } from "../config/format.js";
import { ERR, SDKError, wrapError } from "../errors/index.js";
import type { CircuitDimensions, Field } from "../types/core.js";
import { fromLeBytes, leBytes } from "../utils/big.js";
import { debug } from "../utils/log.js";

/**
 * Ordered fixed-width field encodings bound to either every witness variable
 * or every public input. Entries are copied on construction and frozen.
 */
export class Assignment {
  readonly values: readonly Uint8Array[];

  private constructor(values: Uint8Array[]) {
    this.values = Object.freeze(values);
  }

  static fromEncoded(chunks: readonly Uint8Array[], width = DEFAULT_WITNESS_FORMAT.fieldByteSize): Assignment {
    return new Assignment(chunks.map((c, i) => {
      if (c.length !== width) throw new SDKError(ERR.INVALID_FIELD_SIZE, `assignment entry ${i} is ${c.length} bytes, expected ${width}`);
      return Uint8Array.from(c);
    }));
  }

  get length(): number {
    return this.values.length;
  }

  toFields(): Field[] {
    return this.values.map(fromLeBytes);
  }
}

export function buildPrivateAssignment(witness: readonly Field[], fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): Assignment {
  return Assignment.fromEncoded(witness.map((w) => leBytes(w, fmt.fieldByteSize)), fmt.fieldByteSize);
}

/** Split the raw public-input buffer into one chunk per declared input; surplus bytes are ignored. */
export function buildPublicAssignment(raw: Uint8Array, numInputs: number, fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): Assignment {
  const n8 = fmt.fieldByteSize;
  if (raw.length < numInputs * n8) {
    throw new SDKError(ERR.TRUNCATED_PUBLIC_INPUT, `public inputs are ${raw.length} bytes, need ${numInputs * n8} for ${numInputs} inputs`);
  }
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < numInputs; i++) chunks.push(raw.subarray(i * n8, (i + 1) * n8));
  return Assignment.fromEncoded(chunks, n8);
}

/** Pack public-input values into the raw buffer buildPublicAssignment splits. */
export function encodePublicInputs(values: readonly Field[], fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): Uint8Array {
  const out = new Uint8Array(values.length * fmt.fieldByteSize);
  values.forEach((v, i) => {
    if (v < 0n || v >= fmt.fieldModulus) throw new SDKError(ERR.INVALID_FIELD_ELEMENT, `public input ${i} is not a canonical field element`);
    out.set(leBytes(v, fmt.fieldByteSize), i * fmt.fieldByteSize);
  });
  return out;
}

export function loadCircuit<TInstance extends CircuitDimensions>(backend: ProofBackend<TInstance, unknown, unknown>, bytes: Uint8Array): TInstance {
  try {
    const inst = backend.deserializeInstance(bytes);
    debug("assign", "circuit", circuitDimensions(inst));
    return inst;
  } catch (e) {
    throw wrapError(ERR.CIRCUIT_DESERIALIZATION, "failed to deserialize circuit", e);
  }
}

export function circuitDimensions(inst: CircuitDimensions): CircuitDimensions {
  return { numCons: inst.numCons, numVars: inst.numVars, numInputs: inst.numInputs };
}
