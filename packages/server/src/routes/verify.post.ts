import { FastifyInstance } from "fastify";
import { VerifyBodyZ } from "../validation/payload.js";
import { ProverService, resolveCircuit } from "../services/prover.js";

export default async function (app: FastifyInstance, svc: ProverService) {
  app.post("/api/v1/verify", async (req, rep) => {
    const body = VerifyBodyZ.parse(req.body);
    const circuit = resolveCircuit(svc, body);

    const verified = svc.prover.verify(circuit, body.proof, body.publicInputs);
    req.log.info({ circuitName: body.circuitName, verified }, "proof checked");
    return rep.send({ verified });
  });
}
