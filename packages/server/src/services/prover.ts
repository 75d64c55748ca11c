import {
  ERR,
  SDKError,
  createDigestBackend,
  createProver,
  loadCircuitArtifacts,
} from "@nizkit/sdk";
import type { CircuitArtifacts, ProofBackend, Prover } from "@nizkit/sdk";

export interface ProverService {
  backend: ProofBackend;
  prover: Prover;
  circuits: CircuitArtifacts;
}

export async function createProverService(opts: { circuitsManifest?: string; transcriptLabel?: string } = {}): Promise<ProverService> {
  const backend = createDigestBackend();
  const circuits: CircuitArtifacts = opts.circuitsManifest
    ? await loadCircuitArtifacts(opts.circuitsManifest)
    : new Map<string, Uint8Array>();
  return {
    backend,
    prover: createProver({ backend, transcriptLabel: opts.transcriptLabel }),
    circuits,
  };
}

/** Inline circuit bytes win; otherwise look the name up in the manifest. */
export function resolveCircuit(svc: ProverService, ref: { circuit?: Uint8Array; circuitName?: string }): Uint8Array {
  if (ref.circuit) return ref.circuit;
  const name = ref.circuitName ?? "";
  const bytes = svc.circuits.get(name);
  if (!bytes) throw new SDKError(ERR.ARTIFACT_MISSING, `unknown circuit ${name}`);
  return bytes;
}
