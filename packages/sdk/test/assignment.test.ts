import { describe, it, expect } from "vitest";
import {
  Assignment,
  ERR,
  SECQ256K1_SCALAR_MODULUS,
  buildPrivateAssignment,
  buildPublicAssignment,
  circuitDimensions,
  encodePublicInputs,
  loadCircuit,
} from "../src/index.js";
import { leBytes } from "../src/utils/big.js";
import { backend, CUBIC, codeOf } from "./fixtures.js";

describe("buildPrivateAssignment", () => {
  it("re-encodes each element as 32 little-endian bytes in order", () => {
    const a = buildPrivateAssignment([1n, 256n, SECQ256K1_SCALAR_MODULUS - 1n]);
    expect(a.length).toBe(3);
    expect(a.values[0]).toEqual(leBytes(1n));
    expect(Array.from(a.values[1].subarray(0, 3))).toEqual([0, 1, 0]);
    expect(a.toFields()).toEqual([1n, 256n, SECQ256K1_SCALAR_MODULUS - 1n]);
  });

  it("is frozen", () => {
    const a = buildPrivateAssignment([1n]);
    expect(Object.isFrozen(a.values)).toBe(true);
  });
});

describe("buildPublicAssignment", () => {
  it("splits the buffer into one 32-byte chunk per input", () => {
    const raw = encodePublicInputs([10n, 20n]);
    expect(raw.length).toBe(64);
    const a = buildPublicAssignment(raw, 2);
    expect(a.toFields()).toEqual([10n, 20n]);
  });

  it("ignores bytes beyond the declared count", () => {
    const raw = encodePublicInputs([10n, 20n, 30n]);
    expect(buildPublicAssignment(raw, 1).toFields()).toEqual([10n]);
    expect(buildPublicAssignment(raw, 0).length).toBe(0);
  });

  it("takes chunks verbatim without validating them", () => {
    const raw = new Uint8Array(32).fill(0xff);
    expect(buildPublicAssignment(raw, 1).toFields()).toEqual([2n ** 256n - 1n]);
  });

  it("rejects a buffer shorter than numInputs * 32", () => {
    expect(codeOf(() => buildPublicAssignment(new Uint8Array(63), 2))).toBe(ERR.TRUNCATED_PUBLIC_INPUT);
    expect(codeOf(() => buildPublicAssignment(new Uint8Array(0), 1))).toBe(ERR.TRUNCATED_PUBLIC_INPUT);
  });

  it("copies its input", () => {
    const raw = encodePublicInputs([10n]);
    const a = buildPublicAssignment(raw, 1);
    raw[0] = 99;
    expect(a.toFields()).toEqual([10n]);
  });
});

describe("Assignment.fromEncoded", () => {
  it("rejects entries of the wrong width", () => {
    expect(codeOf(() => Assignment.fromEncoded([new Uint8Array(31)]))).toBe(ERR.INVALID_FIELD_SIZE);
  });
});

describe("encodePublicInputs", () => {
  it("refuses values outside the field", () => {
    expect(codeOf(() => encodePublicInputs([SECQ256K1_SCALAR_MODULUS]))).toBe(ERR.INVALID_FIELD_ELEMENT);
  });
});

describe("loadCircuit", () => {
  it("reads the three dimensions off the instance", () => {
    const inst = loadCircuit(backend, backend.encodeInstance(CUBIC));
    expect(circuitDimensions(inst)).toEqual({ numCons: 3, numVars: 3, numInputs: 1 });
  });

  it("reports malformed bytes as a circuit deserialization error", () => {
    expect(codeOf(() => loadCircuit(backend, new Uint8Array([1, 2, 3])))).toBe(ERR.CIRCUIT_DESERIALIZATION);
  });

  it("rejects matrix entries outside the instance", () => {
    const bytes = backend.encodeInstance({ ...CUBIC, C: [{ row: 0, col: 5, value: 1n }] });
    expect(codeOf(() => loadCircuit(backend, bytes))).toBe(ERR.CIRCUIT_DESERIALIZATION);
  });
});
