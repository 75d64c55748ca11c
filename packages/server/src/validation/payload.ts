import { z } from "zod";
import { u8aFromBase64 } from "@nizkit/sdk";

/**
 * Standard padded base64; empty is allowed (e.g. a circuit without public inputs).
 * Checked with a single character class so multi-megabyte witnesses stay linear.
 */
export const Base64Z = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, "expected base64")
  .refine((s) => s.length % 4 === 0, { message: "expected base64" })
  .transform(u8aFromBase64);

const CircuitRefZ = z.object({
  circuit: Base64Z.optional(),
  circuitName: z.string().min(1).optional(),
});

function oneCircuit(b: { circuit?: Uint8Array; circuitName?: string }) {
  return (b.circuit === undefined) !== (b.circuitName === undefined);
}
const oneCircuitMsg = { message: "provide exactly one of circuit or circuitName" };

export const ProveBodyZ = CircuitRefZ.extend({
  witness: Base64Z,
  publicInputs: Base64Z,
}).refine(oneCircuit, oneCircuitMsg);

export const VerifyBodyZ = CircuitRefZ.extend({
  proof: Base64Z,
  publicInputs: Base64Z,
}).refine(oneCircuit, oneCircuitMsg);
