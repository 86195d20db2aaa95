import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ChatgateConfigStore } from "./config-store.js";
import { ConfigError } from "./errors.js";
import { createRecordingLogger, silentLogger } from "./test-helpers.js";

describe("ChatgateConfigStore", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "chatgate-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates an empty config file and uses defaults", async () => {
    const store = new ChatgateConfigStore({ statePath: dir, logger: silentLogger });
    const config = await store.load();
    expect(store.filePath).toBe(path.join(dir, "chatgate.json"));
    expect(JSON.parse(await fs.readFile(store.filePath, "utf8"))).toEqual({});
    expect(config.port).toBe(13_814);
    expect(config.statePath).toBe(dir);
  });

  it("puts overrides above the file", async () => {
    await fs.writeFile(
      path.join(dir, "chatgate.json"),
      JSON.stringify({ port: 5000, connection: { retriesOnInvalidPackets: 7 } }),
    );
    const store = new ChatgateConfigStore({ statePath: dir, overrides: { port: 0 }, logger: silentLogger });
    const config = await store.load();
    expect(config.port).toBe(0);
    expect(config.connection.retriesOnInvalidPackets).toBe(7);
  });

  it("rejects unknown keys and keeps the previous config", async () => {
    const store = new ChatgateConfigStore({ statePath: dir, logger: silentLogger });
    const before = await store.load();
    await fs.writeFile(store.filePath, JSON.stringify({ prot: 1 }));
    await expect(store.reload()).rejects.toBeInstanceOf(ConfigError);
    expect(store.current()).toBe(before);
  });

  it("swaps in a new object on reload and flags restart-only keys", async () => {
    const logger = createRecordingLogger();
    const store = new ChatgateConfigStore({ statePath: dir, logger });
    const before = await store.load();
    await fs.writeFile(
      store.filePath,
      JSON.stringify({ port: 4100, whitelist: { enabled: true } }),
    );
    const after = await store.reload();

    expect(after).not.toBe(before);
    expect(before.whitelist.enabled).toBe(false);
    expect(after.whitelist.enabled).toBe(true);
    expect(store.current()).toBe(after);
    expect(logger.warn).toHaveBeenCalledWith(
      'Config "port" changed from 13814 to 4100; restart the server to apply it',
    );
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(`Reloaded configuration from ${store.filePath}`);
  });
});
