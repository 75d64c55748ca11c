export { Assignment, buildPrivateAssignment, buildPublicAssignment, encodePublicInputs, loadCircuit, circuitDimensions } from "./assignment.js";
export { prove, verify, createProver } from "./prover.js";
export type { Prover, ProverConfig } from "./prover.js";
export { loadCircuitArtifacts, clearArtifactCache } from "./artifacts.js";
export type { CircuitArtifacts, CircuitManifest } from "./artifacts.js";
