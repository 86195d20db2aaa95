import type { ChatgateConfigInput, ChatgateTransport } from "../config/types.chatgate.js";
import type { Packet } from "./packets.js";

export type Logger = Pick<typeof console, "info" | "warn" | "error">;

export interface ConnectionSettings {
  /** How often a live connection re-reads these settings. Negative values fall back to the default; 0 disables. */
  connectionRefreshIntervalMillis: number;
  /** Invalid packets tolerated before the connection is closed. Values <= 0 fall back to the default. */
  retriesOnInvalidPackets: number;
  maxRecordBytes: number;
  /** Upper bound on waiting for connections to close during shutdown. */
  closeTimeoutMillis: number;
}

export interface ChatgateConfig {
  port: number;
  bindAddress: string;
  transport: ChatgateTransport;
  statePath: string;
  whitelist: {
    enabled: boolean;
  };
  connection: ConnectionSettings;
  watcher: {
    retryDelayMillis: number;
  };
}

/**
 * Lifecycle of one accepted connection.
 *
 * HANDSHAKE -> ACTIVE -> CLOSING -> CLOSED, or HANDSHAKE -> BANNED / REJECTED
 * when the peer is refused at the gate. BANNED, REJECTED and CLOSED are terminal.
 */
export type ConnectionState = "HANDSHAKE" | "ACTIVE" | "CLOSING" | "CLOSED" | "BANNED" | "REJECTED";

export const TERMINAL_CONNECTION_STATES: ReadonlySet<ConnectionState> = new Set([
  "CLOSED",
  "BANNED",
  "REJECTED",
]);

export type RouteContext = {
  connectionId: string;
  remoteAddress: string;
  username: string | null;
  send: (packet: Packet) => Promise<void>;
};

/** Receives every valid packet a connection reads while ACTIVE. */
export interface MessageRouter {
  route(packet: Packet, context: RouteContext): void | Promise<void>;
}

export interface ChatgateServerOptions {
  /** Directory holding chatgate.json, banned.json and whitelist.json. */
  statePath?: string;
  /** Applied over the config file; wins on every reload. */
  config?: ChatgateConfigInput;
  logger?: Logger;
  router?: MessageRouter;
}

export interface ChatgateServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
  getConnectionCount(): number;
}
