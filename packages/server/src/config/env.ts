import { z } from "zod";

const EnvZ = z.object({
  PORT: z.coerce.number().int().positive().default(8790),
  HOST: z.string().default("0.0.0.0"),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Circuits and witnesses travel base64-encoded inside JSON
  BODY_LIMIT: z.coerce.number().int().positive().default(16 * 1024 * 1024),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  CIRCUITS_MANIFEST: z.string().min(1).optional(),
  TRANSCRIPT_LABEL: z.string().min(1).optional(),
});

export type Env = {
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: z.infer<typeof EnvZ>["LOG_LEVEL"];
  bodyLimit: number;
  rateLimitMax: number;
  circuitsManifest?: string;
  transcriptLabel?: string;
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const e = EnvZ.parse(source);
  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    bodyLimit: e.BODY_LIMIT,
    rateLimitMax: e.RATE_LIMIT_MAX,
    circuitsManifest: e.CIRCUITS_MANIFEST,
    transcriptLabel: e.TRANSCRIPT_LABEL,
  };
}
