import { deserialize, serialize, Schema } from "borsh";
import { z } from "zod";
import type { Assignment } from "../circuits/assignment.js";
import { SECQ256K1_SCALAR_MODULUS } from "../config/format.js";
import type { CircuitDimensions, Field } from "../types/core.js";
import { fromLeBytes, leBytes, mod, u64le } from "../utils/big.js";
import { bytesEqual, concatAll } from "../utils/serde.js";
import type { ProofBackend, Transcript } from "./api.js";
import { HashTranscript, sha256 } from "./transcript.js";

// In-process stand-in for a real proving system: it checks R1CS satisfiability
// and binds a hash-based proof to the instance, parameters and public inputs.
// It is not zero-knowledge and not sound against a forging prover.

export interface R1CSEntry {
  row: number;
  col: number;
  value: Field;
}

export interface R1CSDefinition extends CircuitDimensions {
  A: R1CSEntry[];
  B: R1CSEntry[];
  C: R1CSEntry[];
}

export interface R1CSInstance extends R1CSDefinition {
  /** SHA-256 of the canonical encoding */
  digest: Uint8Array;
}

export interface DigestGens extends CircuitDimensions {
  digest: Uint8Array;
}

export interface DigestProof {
  commitment: Uint8Array;
  challenge: Uint8Array;
  response: Uint8Array;
}

export const PROOF_BYTES = 96;

const Bytes32: Schema = { array: { type: "u8", len: 32 } };
const EntrySchema: Schema = { struct: { row: "u32", col: "u32", value: Bytes32 } };
const InstanceSchema: Schema = {
  struct: {
    numCons: "u64",
    numVars: "u64",
    numInputs: "u64",
    A: { array: { type: EntrySchema } },
    B: { array: { type: EntrySchema } },
    C: { array: { type: EntrySchema } },
  },
};
const ProofSchema: Schema = { struct: { commitment: Bytes32, challenge: Bytes32, response: Bytes32 } };

const Bytes32Z = z
  .union([z.instanceof(Uint8Array), z.array(z.number().int().min(0).max(255))])
  .transform((a) => Uint8Array.from(a))
  .refine((a) => a.length === 32, { message: "expected 32 bytes" });
const DimZ = z.union([z.bigint(), z.number()]).transform(Number).pipe(z.number().int().nonnegative().max(0xffffffff));

export interface DigestBackendOptions {
  fieldModulus?: bigint;
}

export type DigestBackend = ProofBackend<R1CSInstance, DigestProof, DigestGens> & {
  encodeInstance(def: R1CSDefinition): Uint8Array;
};

export function createDigestBackend(opts: DigestBackendOptions = {}): DigestBackend {
  const p = opts.fieldModulus ?? SECQ256K1_SCALAR_MODULUS;

  const FieldZ = Bytes32Z.transform(fromLeBytes).refine((v) => v < p, { message: "non-canonical field element" });
  const EntryZ = z.object({ row: z.number().int().nonnegative(), col: z.number().int().nonnegative(), value: FieldZ });
  const InstanceZ = z
    .object({ numCons: DimZ, numVars: DimZ, numInputs: DimZ, A: z.array(EntryZ), B: z.array(EntryZ), C: z.array(EntryZ) })
    .superRefine((inst, ctx) => {
      const width = inst.numVars + 1 + inst.numInputs;
      for (const m of ["A", "B", "C"] as const) {
        inst[m].forEach((e, i) => {
          if (e.row >= inst.numCons || e.col >= width) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${m}[${i}] (${e.row}, ${e.col}) is outside ${inst.numCons}x${width}` });
          }
        });
      }
    });
  const ProofZ = z.object({ commitment: Bytes32Z, challenge: Bytes32Z, response: Bytes32Z });

  function encodeInstance(def: R1CSDefinition): Uint8Array {
    const entries = (m: R1CSEntry[]) => m.map((e) => ({ row: e.row, col: e.col, value: Array.from(leBytes(mod(e.value, p))) }));
    return serialize(InstanceSchema, {
      numCons: BigInt(def.numCons),
      numVars: BigInt(def.numVars),
      numInputs: BigInt(def.numInputs),
      A: entries(def.A),
      B: entries(def.B),
      C: entries(def.C),
    });
  }

  function toFields(a: Assignment, what: string): Field[] {
    return a.toFields().map((v, i) => {
      if (v >= p) throw new Error(`${what} ${i} is not a canonical field element`);
      return v;
    });
  }

  // Sparse: only rows with at least one entry appear. numCons comes from the
  // caller's circuit and can be up to 2^32 - 1.
  function product(m: R1CSEntry[], vec: Field[]): Map<number, Field> {
    const out = new Map<number, Field>();
    for (const e of m) out.set(e.row, mod((out.get(e.row) ?? 0n) + e.value * vec[e.col], p));
    return out;
  }

  // Absorbs the statement, then the commitment; returns the challenge.
  function bind(t: Transcript, inst: R1CSInstance, gens: DigestGens, inputs: Assignment, commitment: Uint8Array): Uint8Array {
    t.appendMessage("gens", gens.digest);
    t.appendMessage("instance", inst.digest);
    t.appendMessage("inputs", concatAll(inputs.values));
    t.appendMessage("commitment", commitment);
    return t.challengeBytes("challenge", 32);
  }

  function respond(challenge: Uint8Array, commitment: Uint8Array, inst: R1CSInstance, gens: DigestGens, inputs: Assignment): Uint8Array {
    return sha256(new TextEncoder().encode("response"), challenge, commitment, gens.digest, inst.digest, inputs.values);
  }

  return {
    name: "digest",
    encodeInstance,

    deserializeInstance(bytes) {
      const def = InstanceZ.parse(deserialize(InstanceSchema, bytes));
      return { ...def, digest: sha256(encodeInstance(def)) };
    },

    createGens(numCons, numVars, numInputs) {
      const digest = sha256(new TextEncoder().encode("nizkit-gens"), u64le(numCons), u64le(numVars), u64le(numInputs));
      return { numCons, numVars, numInputs, digest };
    },

    createTranscript(label) {
      return new HashTranscript(label);
    },

    prove(inst, vars, inputs, gens, transcript) {
      if (vars.length !== inst.numVars) throw new Error(`witness has ${vars.length} variables, circuit expects ${inst.numVars}`);
      if (inputs.length !== inst.numInputs) throw new Error(`got ${inputs.length} public inputs, circuit expects ${inst.numInputs}`);

      // (vars || 1 || inputs)
      const vec = [...toFields(vars, "witness"), 1n, ...toFields(inputs, "public input")];
      const az = product(inst.A, vec);
      const bz = product(inst.B, vec);
      const cz = product(inst.C, vec);
      // A row with no entries anywhere reads 0 * 0 = 0.
      const rows = [...new Set([...az.keys(), ...bz.keys(), ...cz.keys()])].sort((x, y) => x - y);
      for (const i of rows) {
        if (mod((az.get(i) ?? 0n) * (bz.get(i) ?? 0n), p) !== (cz.get(i) ?? 0n)) throw new Error(`constraint ${i} is not satisfied`);
      }

      const commitment = sha256(new TextEncoder().encode("commitment"), gens.digest, vars.values);
      const challenge = bind(transcript, inst, gens, inputs, commitment);
      return { commitment, challenge, response: respond(challenge, commitment, inst, gens, inputs) };
    },

    verify(proof, inst, inputs, transcript, gens) {
      if (inputs.length !== inst.numInputs) return false;
      const challenge = bind(transcript, inst, gens, inputs, proof.commitment);
      if (!bytesEqual(challenge, proof.challenge)) return false;
      return bytesEqual(respond(challenge, proof.commitment, inst, gens, inputs), proof.response);
    },

    serializeProof(proof) {
      return serialize(ProofSchema, {
        commitment: Array.from(proof.commitment),
        challenge: Array.from(proof.challenge),
        response: Array.from(proof.response),
      });
    },

    deserializeProof(bytes) {
      if (bytes.length !== PROOF_BYTES) throw new Error(`proof is ${bytes.length} bytes, expected ${PROOF_BYTES}`);
      return ProofZ.parse(deserialize(ProofSchema, bytes));
    },
  };
}
