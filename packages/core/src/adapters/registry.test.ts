import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { mergeConfig } from "../config.js";
import { NotFoundError } from "../errors.js";
import { ScannerBufferPool } from "../jsonl/bufferPool.js";
import { AdapterRegistry, createAdapters, detectAdapters } from "./registry.js";

const PROJECT = "/srv/demo";

async function tempRoot(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `sessionscope-registry-${label}-`));
}

describe("createAdapters", () => {
  it("builds every enabled adapter in a fixed order", () => {
    const adapters = createAdapters(mergeConfig({ adapters: { "gemini-cli": { enabled: false } } }));

    expect(adapters.map((adapter) => adapter.id)).toEqual(["codex", "claude-code", "pi-agent"]);
  });

  it("takes roots from the config", () => {
    const config = mergeConfig({ adapters: { codex: { root: "/data/codex" } } });

    const [codex] = createAdapters(config);

    expect(codex?.root).toBe("/data/codex");
  });

  it("accepts a caller-provided scanner pool", () => {
    const pool = new ScannerBufferPool(4096);
    const adapters = createAdapters(mergeConfig(), { bufferPool: pool });

    expect(adapters).toHaveLength(4);
  });
});

describe("detectAdapters", () => {
  it("keeps only adapters with sessions for the project", async () => {
    const codexRoot = await tempRoot("codex");
    await mkdir(path.join(codexRoot, "2026", "03", "01"), { recursive: true });
    await writeFile(
      path.join(codexRoot, "2026", "03", "01", "rollout-a.jsonl"),
      `${JSON.stringify({ timestamp: "2026-03-01T08:00:00.000Z", type: "session_meta", payload: { id: "c1", cwd: PROJECT } })}\n`,
      "utf8",
    );
    const config = mergeConfig({
      adapters: {
        codex: { root: codexRoot },
        "claude-code": { root: await tempRoot("claude") },
        "gemini-cli": { root: await tempRoot("gemini") },
        "pi-agent": { root: await tempRoot("pi") },
      },
    });

    const detected = await detectAdapters(createAdapters(config), PROJECT);

    expect(detected.map((adapter) => adapter.id)).toEqual(["codex"]);
  });
});

describe("AdapterRegistry", () => {
  it("looks adapters up by id", () => {
    const registry = AdapterRegistry.fromConfig(mergeConfig({ adapters: { "pi-agent": { enabled: false } } }));

    expect(registry.byId("claude-code")?.name).toBe("Claude Code");
    expect(registry.byId("pi-agent")).toBeUndefined();
    expect(() => registry.require("pi-agent")).toThrow(NotFoundError);
  });
});
