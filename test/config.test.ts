import fs from "fs/promises";
import os from "os";
import path from "path";
import { ZodError } from "zod";
import { loadConfig, resolveConfig } from "../src/config/load";

describe("resolveConfig", () => {
  it("fills every default from an empty object", () => {
    expect(resolveConfig({})).toEqual({
      node: { host: "127.0.0.1", port: 7000, peers: [] },
      flood: { dedupeMaxEntries: 16, pollIntervalMs: 50 },
      observability: { logLevel: "info", logHuman: false },
    });
  });

  it("keeps values from the file", () => {
    const config = resolveConfig({
      node: { port: 7100, peers: ["127.0.0.1:7101"] },
      flood: { dedupeMaxEntries: 64 },
    });
    expect(config.node).toEqual({ host: "127.0.0.1", port: 7100, peers: ["127.0.0.1:7101"] });
    expect(config.flood.dedupeMaxEntries).toBe(64);
  });

  it("applies environment overrides", () => {
    const config = resolveConfig(
      { observability: { logLevel: "warn" } },
      { FLOODNET_LOG_LEVEL: "debug", FLOODNET_LOG_HUMAN: "true" }
    );
    expect(config.observability).toEqual({ logLevel: "debug", logHuman: true });
  });

  it("rejects invalid values", () => {
    expect(() => resolveConfig({ node: { port: 70000 } })).toThrow(ZodError);
    expect(() => resolveConfig({ flood: { dedupeMaxEntries: 0 } })).toThrow(ZodError);
    expect(() => resolveConfig({}, { FLOODNET_LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});

describe("loadConfig", () => {
  it("reads a JSON file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "floodnet-"));
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, JSON.stringify({ node: { host: "0.0.0.0", port: 7200 } }));

    try {
      const config = await loadConfig(file, {});
      expect(config.node.host).toBe("0.0.0.0");
      expect(config.node.port).toBe(7200);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("uses defaults without a file", async () => {
    const config = await loadConfig(undefined, {});
    expect(config.node.port).toBe(7000);
  });
});
