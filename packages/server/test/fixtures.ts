import {
  base64FromU8a,
  createDigestBackend,
  encodePublicInputs,
  serializeWitness,
} from "@nizkit/sdk";
import type { R1CSDefinition } from "@nizkit/sdk";

// x * x = y with one public input y. Columns: 0 x, 1 constant one, 2 y.
export const SQUARE: R1CSDefinition = {
  numCons: 1,
  numVars: 1,
  numInputs: 1,
  A: [{ row: 0, col: 0, value: 1n }],
  B: [{ row: 0, col: 0, value: 1n }],
  C: [{ row: 0, col: 2, value: 1n }],
};

export const circuitBytes = createDigestBackend().encodeInstance(SQUARE);

export const b64 = {
  circuit: base64FromU8a(circuitBytes),
  witness: base64FromU8a(serializeWitness([7n])),
  publicInputs: base64FromU8a(encodePublicInputs([49n])),
  wrongInputs: base64FromU8a(encodePublicInputs([50n])),
};
