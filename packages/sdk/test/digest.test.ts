import { describe, it, expect } from "vitest";
import { Assignment, HashTranscript, SECQ256K1_SCALAR_MODULUS, buildPublicAssignment, createDigestBackend } from "../src/index.js";
import { leBytes } from "../src/utils/big.js";
import { backend, CUBIC } from "./fixtures.js";

const enc = new TextEncoder();

describe("HashTranscript", () => {
  it("yields identical challenges for identical histories", () => {
    const a = new HashTranscript(enc.encode("label"));
    const b = new HashTranscript(enc.encode("label"));
    a.appendMessage("m", new Uint8Array([1, 2]));
    b.appendMessage("m", new Uint8Array([1, 2]));
    expect(a.challengeBytes("c", 32)).toEqual(b.challengeBytes("c", 32));
    expect(a.challengeBytes("c", 32)).toEqual(b.challengeBytes("c", 32));
  });

  it("separates domain labels and message framing", () => {
    const c = (label: string, msgs: [string, number[]][]) => {
      const t = new HashTranscript(enc.encode(label));
      for (const [l, m] of msgs) t.appendMessage(l, new Uint8Array(m));
      return t.challengeBytes("c", 32);
    };
    expect(c("x", [])).not.toEqual(c("y", []));
    expect(c("x", [["a", [1, 2]]])).not.toEqual(c("x", [["a", [1]], ["a", [2]]]));
  });

  it("produces challenges of any length and advances its state", () => {
    const t = new HashTranscript(enc.encode("label"));
    const first = t.challengeBytes("c", 70);
    expect(first.length).toBe(70);
    expect(t.challengeBytes("c", 70)).not.toEqual(first);
  });
});

describe("createDigestBackend", () => {
  it("derives identical parameters from identical dimensions", () => {
    const other = createDigestBackend();
    expect(backend.createGens(3, 3, 1)).toEqual(other.createGens(3, 3, 1));
    expect(backend.createGens(3, 3, 1).digest).not.toEqual(backend.createGens(3, 3, 2).digest);
  });

  it("decodes what it encodes", () => {
    const inst = backend.deserializeInstance(backend.encodeInstance(CUBIC));
    expect(inst.numCons).toBe(3);
    expect(inst.A).toEqual(CUBIC.A);
    expect(inst.C).toEqual(CUBIC.C);
    expect(inst.digest.length).toBe(32);
  });

  it("reduces negative coefficients into the field", () => {
    const bytes = backend.encodeInstance({ numCons: 1, numVars: 1, numInputs: 0, A: [{ row: 0, col: 0, value: -1n }], B: [], C: [] });
    expect(backend.deserializeInstance(bytes).A[0].value).toBe(SECQ256K1_SCALAR_MODULUS - 1n);
  });

  it("rejects non-canonical public inputs when proving", () => {
    const inst = backend.deserializeInstance(backend.encodeInstance(CUBIC));
    const gens = backend.createGens(3, 3, 1);
    const vars = Assignment.fromEncoded([leBytes(3n), leBytes(9n), leBytes(27n)]);
    const inputs = buildPublicAssignment(new Uint8Array(32).fill(0xff), 1);
    expect(() => backend.prove(inst, vars, inputs, gens, backend.createTranscript(enc.encode("l")))).toThrow(/not a canonical field element/);
  });
});
