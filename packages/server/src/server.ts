import "dotenv/config";
import { loadEnv } from "./config/env.js";
import { buildApp } from "./app.js";
import { createProverService } from "./services/prover.js";

const env = loadEnv();
const service = await createProverService({
  circuitsManifest: env.circuitsManifest,
  transcriptLabel: env.transcriptLabel,
});

const app = await buildApp({
  service,
  logger: { level: env.logLevel },
  bodyLimit: env.bodyLimit,
  corsOrigin: env.corsOrigin,
  rateLimitMax: env.rateLimitMax,
});

async function shutdown(signal: string) {
  app.log.info(`${signal} received, shutting down gracefully...`);
  await app.close();
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      app.log.error({ err }, "shutdown failed");
      process.exit(1);
    });
  });
}

await app.listen({ port: env.port, host: env.host });
app.log.info(`nizkit-server listening on http://${env.host}:${env.port} (${service.circuits.size} circuit(s) registered)`);
