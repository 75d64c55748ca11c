import { FastifyInstance } from "fastify";
import { circuitDimensions, loadCircuit } from "@nizkit/sdk";
import { ProverService } from "../services/prover.js";

/**
 * GET /api/v1/circuits - circuits registered through the manifest, with the
 * dimensions the prover will derive parameters from.
 */
export default async function (app: FastifyInstance, svc: ProverService) {
  app.get("/api/v1/circuits", async (_req, rep) => {
    const circuits = [...svc.circuits.entries()].map(([name, bytes]) => ({
      name,
      ...circuitDimensions(loadCircuit(svc.backend, bytes)),
    }));
    return rep.send({ success: true, circuits });
  });
}
