import { FastifyInstance } from "fastify";
import { base64FromU8a } from "@nizkit/sdk";
import { ProveBodyZ } from "../validation/payload.js";
import { ProverService, resolveCircuit } from "../services/prover.js";

export default async function (app: FastifyInstance, svc: ProverService) {
  app.post("/api/v1/prove", async (req, rep) => {
    const body = ProveBodyZ.parse(req.body);
    const circuit = resolveCircuit(svc, body);

    const proof = svc.prover.prove(circuit, body.witness, body.publicInputs);
    req.log.info({ circuitName: body.circuitName, proofBytes: proof.length }, "proof generated");
    return rep.send({ proof: base64FromU8a(proof) });
  });
}
