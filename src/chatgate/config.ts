import os from "node:os";
import path from "node:path";

import type { ChatgateConfigInput } from "../config/types.chatgate.js";
import type { ChatgateConfig, ConnectionSettings } from "./domain.js";
import { deepMerge } from "./utils/deep-merge.js";

export const DEFAULT_CONNECTION_REFRESH_INTERVAL_MS = 1_000;
export const DEFAULT_RETRIES_ON_INVALID_PACKETS = 3;

export const CONFIG_FILENAME = "chatgate.json";

const defaultStatePath = path.join(os.homedir(), ".chatgate");

function expandUserPath(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function resolveStatePath(value: string | undefined): string {
  const trimmed = value?.trim();
  const raw = trimmed && trimmed.length > 0 ? trimmed : defaultStatePath;
  const expanded = expandUserPath(raw);
  return path.isAbsolute(expanded) ? expanded : path.resolve(expanded);
}

const DEFAULTS: Omit<ChatgateConfig, "statePath"> = {
  port: 13_814,
  bindAddress: "127.0.0.1",
  transport: "tcp",
  whitelist: {
    enabled: false,
  },
  connection: {
    connectionRefreshIntervalMillis: DEFAULT_CONNECTION_REFRESH_INTERVAL_MS,
    retriesOnInvalidPackets: DEFAULT_RETRIES_ON_INVALID_PACKETS,
    maxRecordBytes: 65_536,
    closeTimeoutMillis: 5_000,
  },
  watcher: {
    retryDelayMillis: 1_000,
  },
};

/** Layers each input over a fresh copy of the defaults, later inputs winning. */
export function resolveChatgateConfig(
  statePath: string | undefined,
  ...inputs: Array<ChatgateConfigInput | undefined>
): ChatgateConfig {
  const merged: ChatgateConfig = { ...structuredClone(DEFAULTS), statePath: resolveStatePath(statePath) };
  for (const input of inputs) {
    deepMerge(merged, input);
  }
  return merged;
}

export function resolveConnectionRefreshIntervalMillis(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return DEFAULT_CONNECTION_REFRESH_INTERVAL_MS;
  }
  return value;
}

export function resolveRetriesOnInvalidPackets(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_RETRIES_ON_INVALID_PACKETS;
  }
  return Math.floor(value);
}

/** Settings as a live connection should apply them, invalid values replaced by defaults. */
export function effectiveConnectionSettings(settings: Partial<ConnectionSettings>): ConnectionSettings {
  return {
    connectionRefreshIntervalMillis: resolveConnectionRefreshIntervalMillis(
      settings.connectionRefreshIntervalMillis,
    ),
    retriesOnInvalidPackets: resolveRetriesOnInvalidPackets(settings.retriesOnInvalidPackets),
    maxRecordBytes: settings.maxRecordBytes ?? DEFAULTS.connection.maxRecordBytes,
    closeTimeoutMillis: settings.closeTimeoutMillis ?? DEFAULTS.connection.closeTimeoutMillis,
  };
}
