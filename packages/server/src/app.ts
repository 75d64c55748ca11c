import Fastify, { FastifyInstance, FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import rate from "@fastify/rate-limit";
import { ZodError } from "zod";
import { ERR, ErrCode, isSDKError } from "@nizkit/sdk";
import { ProverService } from "./services/prover.js";

import provePost from "./routes/prove.post.js";
import verifyPost from "./routes/verify.post.js";
import circuitsGet from "./routes/circuits.get.js";

export interface AppOptions {
  service: ProverService;
  logger?: FastifyServerOptions["logger"];
  bodyLimit?: number;
  corsOrigin?: string;
  rateLimitMax?: number;
}

// Structural problems with the caller's bytes are 4xx; a failing backend is 5xx.
function statusFor(code: ErrCode): number {
  switch (code) {
    case ERR.BACKEND_INVOCATION:
      return 500;
    case ERR.ARTIFACT_MISSING:
      return 404;
    default:
      return 400;
  }
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? true,
    bodyLimit: opts.bodyLimit ?? 16 * 1024 * 1024,
  });

  await app.register(cors, { origin: opts.corsOrigin ?? "*" });
  await app.register(rate, { max: opts.rateLimitMax ?? 100, timeWindow: "1 minute" });

  app.setErrorHandler((err, req, rep) => {
    if (err instanceof ZodError) {
      return rep.status(400).send({ error: "BAD_REQUEST", message: err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ") });
    }
    if (isSDKError(err)) {
      const status = statusFor(err.code);
      if (status >= 500) req.log.error({ err }, "proof backend failed");
      return rep.status(status).send({ error: err.code, message: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return rep.status(err.statusCode).send({ error: err.code, message: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return rep.status(500).send({ error: "INTERNAL", message: "internal error" });
  });

  app.get("/healthz", async () => ({ ok: true }));

  await app.register(provePost, opts.service);
  await app.register(verifyPost, opts.service);
  await app.register(circuitsGet, opts.service);

  return app;
}
