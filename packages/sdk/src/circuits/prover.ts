import type { ProofBackend } from "../backend/api.js";
import { DEFAULT_TRANSCRIPT_LABEL, DEFAULT_WITNESS_FORMAT, WitnessFormat } from "../config/format.js";
import { ERR, wrapError } from "../errors/index.js";
import type { CircuitDimensions } from "../types/core.js";
import { debug } from "../utils/log.js";
import { parseWitness } from "../witness/reader.js";
import { buildPrivateAssignment, buildPublicAssignment, circuitDimensions, loadCircuit } from "./assignment.js";

export interface ProverConfig<TInstance extends CircuitDimensions, TProof, TGens> {
  backend: ProofBackend<TInstance, TProof, TGens>;
  /** Domain label for the transcript; prover and verifier must agree byte for byte */
  transcriptLabel?: string | Uint8Array;
  format?: WitnessFormat;
}

export interface Prover {
  prove(circuit: Uint8Array, witness: Uint8Array, publicInputs: Uint8Array): Uint8Array;
  verify(circuit: Uint8Array, proof: Uint8Array, publicInputs: Uint8Array): boolean;
}

function labelBytes(label: string | Uint8Array | undefined): Uint8Array {
  const l = label ?? DEFAULT_TRANSCRIPT_LABEL;
  return typeof l === "string" ? new TextEncoder().encode(l) : l;
}

function invoke<T>(step: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    throw wrapError(ERR.BACKEND_INVOCATION, `backend failed during ${step}`, e);
  }
}

/** Parse the witness, assemble both assignments and return a serialized proof. */
export function prove<TInstance extends CircuitDimensions, TProof, TGens>(
  circuit: Uint8Array,
  witness: Uint8Array,
  publicInputs: Uint8Array,
  config: ProverConfig<TInstance, TProof, TGens>
): Uint8Array {
  const { backend } = config;
  const fmt = config.format ?? DEFAULT_WITNESS_FORMAT;
  const started = performance.now();

  const vars = buildPrivateAssignment(parseWitness(witness, fmt), fmt);
  const inst = loadCircuit(backend, circuit);
  const { numCons, numVars, numInputs } = circuitDimensions(inst);

  const gens = invoke("parameter generation", () => backend.createGens(numCons, numVars, numInputs));
  const inputs = buildPublicAssignment(publicInputs, numInputs, fmt);
  const transcript = invoke("transcript setup", () => backend.createTranscript(labelBytes(config.transcriptLabel)));

  const proof = invoke("proving", () => backend.prove(inst, vars, inputs, gens, transcript));
  const bytes = invoke("proof serialization", () => backend.serializeProof(proof));

  debug("prover", `${backend.name} proof`, { numCons, numVars, numInputs, bytes: bytes.length, ms: Math.round(performance.now() - started) });
  return bytes;
}

/** Check a serialized proof against the circuit and public inputs. Rejection is `false`, never an error. */
export function verify<TInstance extends CircuitDimensions, TProof, TGens>(
  circuit: Uint8Array,
  proof: Uint8Array,
  publicInputs: Uint8Array,
  config: ProverConfig<TInstance, TProof, TGens>
): boolean {
  const { backend } = config;
  const fmt = config.format ?? DEFAULT_WITNESS_FORMAT;

  const inst = loadCircuit(backend, circuit);
  let parsed: TProof;
  try {
    parsed = backend.deserializeProof(proof);
  } catch (e) {
    throw wrapError(ERR.PROOF_DESERIALIZATION, "failed to deserialize proof", e);
  }

  const { numCons, numVars, numInputs } = circuitDimensions(inst);
  const gens = invoke("parameter generation", () => backend.createGens(numCons, numVars, numInputs));
  const inputs = buildPublicAssignment(publicInputs, numInputs, fmt);
  const transcript = invoke("transcript setup", () => backend.createTranscript(labelBytes(config.transcriptLabel)));

  const ok = invoke("verification", () => backend.verify(parsed, inst, inputs, transcript, gens));
  debug("prover", `${backend.name} verify`, { numCons, numVars, numInputs, ok });
  return ok;
}

export function createProver<TInstance extends CircuitDimensions, TProof, TGens>(
  config: ProverConfig<TInstance, TProof, TGens>
): Prover {
  return {
    prove: (circuit, witness, publicInputs) => prove(circuit, witness, publicInputs, config),
    verify: (circuit, proof, publicInputs) => verify(circuit, proof, publicInputs, config),
  };
}
