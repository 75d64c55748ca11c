// Entry points
export { prove, verify, createProver } from "./circuits/index.js";
export type { Prover, ProverConfig } from "./circuits/index.js";

// Witness files
export { parseWitness, safeParseWitness, readWitnessHeader, BinaryReader } from "./witness/reader.js";
export { serializeWitness } from "./witness/writer.js";
export type { SerializeWitnessOptions } from "./witness/writer.js";

// Assignments and circuits
export {
  Assignment,
  buildPrivateAssignment,
  buildPublicAssignment,
  encodePublicInputs,
  loadCircuit,
  circuitDimensions,
  loadCircuitArtifacts,
  clearArtifactCache,
} from "./circuits/index.js";
export type { CircuitArtifacts, CircuitManifest } from "./circuits/index.js";

// Backends
export type { ProofBackend, Transcript } from "./backend/api.js";
export { createDigestBackend, PROOF_BYTES } from "./backend/digest.js";
export type { DigestBackend, DigestBackendOptions, DigestGens, DigestProof, R1CSDefinition, R1CSEntry, R1CSInstance } from "./backend/digest.js";
export { HashTranscript } from "./backend/transcript.js";

// Configuration
export {
  DEFAULT_WITNESS_FORMAT,
  DEFAULT_TRANSCRIPT_LABEL,
  SECQ256K1_SCALAR_MODULUS,
  resolveWitnessFormat,
} from "./config/format.js";
export type { WitnessFormat, WitnessFormatOverrides } from "./config/format.js";

// Errors and helpers
export { SDKError, ERR, isSDKError, attempt } from "./errors/index.js";
export type { ErrCode, Result } from "./errors/index.js";
export type { Field, CircuitDimensions, WitnessHeader } from "./types/core.js";
export { hexFromU8a, u8aFromBase64, base64FromU8a } from "./utils/serde.js";
