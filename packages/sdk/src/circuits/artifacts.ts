import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ERR, SDKError } from "../errors/index.js";
import { debug } from "../utils/log.js";

const ManifestZ = z.object({
  circuits: z.record(
    z.object({
      /** Relative to the manifest */
      circuit: z.string().min(1),
      sha256: z.string().regex(/^[0-9a-fA-F]{64}$/).optional(),
    })
  ),
});

export type CircuitManifest = z.infer<typeof ManifestZ>;
export type CircuitArtifacts = ReadonlyMap<string, Uint8Array>;

const cache = new Map<string, CircuitArtifacts>();

/** Load every circuit a manifest names, checking optional sha256 pins. Cached per manifest path. */
export async function loadCircuitArtifacts(manifestPath: string): Promise<CircuitArtifacts> {
  const key = path.resolve(manifestPath);
  const hit = cache.get(key);
  if (hit) return hit;

  let raw: unknown;
  try {
    raw = JSON.parse((await readOrMissing(key, "manifest")).toString("utf8"));
  } catch (e) {
    if (e instanceof SDKError) throw e;
    throw new SDKError(ERR.INVALID_CONFIG, `circuit manifest ${key} is not valid JSON`, e);
  }
  const manifest = ManifestZ.safeParse(raw);
  if (!manifest.success) {
    throw new SDKError(ERR.INVALID_CONFIG, `invalid circuit manifest ${key}: ${manifest.error.issues.map(i => `${i.path.join(".")} ${i.message}`).join(", ")}`, manifest.error);
  }

  const out = new Map<string, Uint8Array>();
  for (const [name, entry] of Object.entries(manifest.data.circuits)) {
    const file = path.resolve(path.dirname(key), entry.circuit);
    const bytes = new Uint8Array(await readOrMissing(file, `circuit ${name}`));
    if (entry.sha256 && sha256(bytes) !== entry.sha256.toLowerCase()) {
      throw new SDKError(ERR.ARTIFACT_INTEGRITY, `circuit ${name} integrity mismatch (${file})`);
    }
    out.set(name, bytes);
  }
  debug("artifacts", `loaded ${out.size} circuit(s) from ${key}`);
  cache.set(key, out);
  return out;
}

export function clearArtifactCache() {
  cache.clear();
}

async function readOrMissing(file: string, what: string): Promise<Buffer> {
  try {
    return await fs.readFile(file);
  } catch (e) {
    throw new SDKError(ERR.ARTIFACT_MISSING, `${what} not readable at ${file}`, e);
  }
}

function sha256(b: Uint8Array) { return createHash("sha256").update(b).digest("hex"); }
