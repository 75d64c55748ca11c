import type { Assignment } from "../circuits/assignment.js";
import type { CircuitDimensions } from "../types/core.js";

/** Fiat-Shamir transcript, seeded once with a domain label. */
export interface Transcript {
  appendMessage(label: string, message: Uint8Array): void;
  challengeBytes(label: string, length: number): Uint8Array;
}

/**
 * Everything the orchestrator needs from a proving system. Implementations
 * must be deterministic in `createGens`: prover and verifier derive the
 * parameters independently from the same dimensions.
 */
export interface ProofBackend<TInstance extends CircuitDimensions = CircuitDimensions, TProof = unknown, TGens = unknown> {
  readonly name: string;

  // Throws on malformed bytes; the caller reports CIRCUIT_DESERIALIZATION.
  deserializeInstance(bytes: Uint8Array): TInstance;

  createGens(numCons: number, numVars: number, numInputs: number): TGens;
  createTranscript(label: Uint8Array): Transcript;

  prove(instance: TInstance, vars: Assignment, inputs: Assignment, gens: TGens, transcript: Transcript): TProof;
  // false on rejection; throw only for internal failures.
  verify(proof: TProof, instance: TInstance, inputs: Assignment, transcript: Transcript, gens: TGens): boolean;

  serializeProof(proof: TProof): Uint8Array;
  deserializeProof(bytes: Uint8Array): TProof;
}
