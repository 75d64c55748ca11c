import { createHash } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ERR, clearArtifactCache, isSDKError, loadCircuitArtifacts } from "../src/index.js";
import { backend, CUBIC } from "./fixtures.js";

async function codeOfAsync(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (e) {
    if (isSDKError(e)) return e.code;
    throw e;
  }
  throw new Error("expected an error");
}

describe("loadCircuitArtifacts", () => {
  let dir: string;
  const circuit = backend.encodeInstance(CUBIC);
  const digest = createHash("sha256").update(circuit).digest("hex");

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "nizkit-artifacts-"));
    clearArtifactCache();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function manifest(body: unknown): Promise<string> {
    const file = path.join(dir, "artifacts.json");
    await writeFile(file, JSON.stringify(body));
    return file;
  }

  it("loads circuits relative to the manifest and checks their digest", async () => {
    await writeFile(path.join(dir, "cubic.circuit"), circuit);
    const file = await manifest({ circuits: { cubic: { circuit: "./cubic.circuit", sha256: digest } } });
    const loaded = await loadCircuitArtifacts(file);
    expect([...loaded.keys()]).toEqual(["cubic"]);
    expect(loaded.get("cubic")).toEqual(circuit);
  });

  it("caches per manifest path", async () => {
    await writeFile(path.join(dir, "cubic.circuit"), circuit);
    const file = await manifest({ circuits: { cubic: { circuit: "cubic.circuit" } } });
    const first = await loadCircuitArtifacts(file);
    await rm(path.join(dir, "cubic.circuit"));
    expect(await loadCircuitArtifacts(file)).toBe(first);
  });

  it("rejects a circuit whose digest does not match", async () => {
    await writeFile(path.join(dir, "cubic.circuit"), circuit);
    const file = await manifest({ circuits: { cubic: { circuit: "cubic.circuit", sha256: "00".repeat(32) } } });
    expect(await codeOfAsync(loadCircuitArtifacts(file))).toBe(ERR.ARTIFACT_INTEGRITY);
  });

  it("reports missing files", async () => {
    expect(await codeOfAsync(loadCircuitArtifacts(path.join(dir, "nope.json")))).toBe(ERR.ARTIFACT_MISSING);
    const file = await manifest({ circuits: { cubic: { circuit: "absent.circuit" } } });
    expect(await codeOfAsync(loadCircuitArtifacts(file))).toBe(ERR.ARTIFACT_MISSING);
  });

  it("rejects a malformed manifest", async () => {
    const file = await manifest({ circuits: { cubic: { path: "cubic.circuit" } } });
    expect(await codeOfAsync(loadCircuitArtifacts(file))).toBe(ERR.INVALID_CONFIG);
    await writeFile(file, "{ not json");
    clearArtifactCache();
    expect(await codeOfAsync(loadCircuitArtifacts(file))).toBe(ERR.INVALID_CONFIG);
  });
});
