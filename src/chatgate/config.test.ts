import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  DEFAULT_CONNECTION_REFRESH_INTERVAL_MS,
  DEFAULT_RETRIES_ON_INVALID_PACKETS,
  effectiveConnectionSettings,
  resolveChatgateConfig,
  resolveConnectionRefreshIntervalMillis,
  resolveRetriesOnInvalidPackets,
  resolveStatePath,
} from "./config.js";

describe("resolveStatePath", () => {
  it("defaults to ~/.chatgate", () => {
    expect(resolveStatePath(undefined)).toBe(path.join(os.homedir(), ".chatgate"));
    expect(resolveStatePath("   ")).toBe(path.join(os.homedir(), ".chatgate"));
  });

  it("expands ~ and resolves relative paths", () => {
    expect(resolveStatePath("~/chat")).toBe(path.join(os.homedir(), "chat"));
    expect(resolveStatePath("state")).toBe(path.resolve("state"));
    expect(resolveStatePath("/srv/chatgate")).toBe("/srv/chatgate");
  });
});

describe("resolveChatgateConfig", () => {
  it("fills in defaults", () => {
    expect(resolveChatgateConfig("/srv/chatgate")).toEqual({
      port: 13_814,
      bindAddress: "127.0.0.1",
      transport: "tcp",
      statePath: "/srv/chatgate",
      whitelist: { enabled: false },
      connection: {
        connectionRefreshIntervalMillis: 1_000,
        retriesOnInvalidPackets: 3,
        maxRecordBytes: 65_536,
        closeTimeoutMillis: 5_000,
      },
      watcher: { retryDelayMillis: 1_000 },
    });
  });

  it("layers later inputs over earlier ones", () => {
    const config = resolveChatgateConfig(
      "/srv/chatgate",
      { port: 4000, connection: { retriesOnInvalidPackets: 5 } },
      { port: 0, whitelist: { enabled: true } },
    );
    expect(config.port).toBe(0);
    expect(config.whitelist.enabled).toBe(true);
    expect(config.connection.retriesOnInvalidPackets).toBe(5);
    expect(config.connection.maxRecordBytes).toBe(65_536);
  });

  it("does not share state between calls", () => {
    const first = resolveChatgateConfig("/srv/chatgate");
    first.connection.retriesOnInvalidPackets = 9;
    expect(resolveChatgateConfig("/srv/chatgate").connection.retriesOnInvalidPackets).toBe(3);
  });
});

describe("connection setting fallbacks", () => {
  it("replaces a negative refresh interval with the default", () => {
    expect(resolveConnectionRefreshIntervalMillis(-1)).toBe(DEFAULT_CONNECTION_REFRESH_INTERVAL_MS);
    expect(resolveConnectionRefreshIntervalMillis(undefined)).toBe(DEFAULT_CONNECTION_REFRESH_INTERVAL_MS);
    expect(resolveConnectionRefreshIntervalMillis(Number.NaN)).toBe(DEFAULT_CONNECTION_REFRESH_INTERVAL_MS);
    expect(resolveConnectionRefreshIntervalMillis(0)).toBe(0);
    expect(resolveConnectionRefreshIntervalMillis(250)).toBe(250);
  });

  it("replaces a non-positive retry limit with the default", () => {
    expect(resolveRetriesOnInvalidPackets(0)).toBe(DEFAULT_RETRIES_ON_INVALID_PACKETS);
    expect(resolveRetriesOnInvalidPackets(-4)).toBe(DEFAULT_RETRIES_ON_INVALID_PACKETS);
    expect(resolveRetriesOnInvalidPackets(5)).toBe(5);
    expect(resolveRetriesOnInvalidPackets(2.7)).toBe(2);
  });

  it("builds effective settings from a partial set", () => {
    expect(effectiveConnectionSettings({ connectionRefreshIntervalMillis: -5 })).toEqual({
      connectionRefreshIntervalMillis: 1_000,
      retriesOnInvalidPackets: 3,
      maxRecordBytes: 65_536,
      closeTimeoutMillis: 5_000,
    });
  });
});
