import type { Duplex } from "node:stream";

import {
  effectiveConnectionSettings,
  resolveConnectionRefreshIntervalMillis,
  resolveRetriesOnInvalidPackets,
} from "./config.js";
import { ConnectionWriter } from "./connection-writer.js";
import type {
  ConnectionSettings,
  ConnectionState,
  Logger,
  MessageRouter,
} from "./domain.js";
import { TERMINAL_CONNECTION_STATES } from "./domain.js";
import { ConnectionSetupError, describeError, isAbortError } from "./errors.js";
import { PacketReader } from "./packet-reader.js";
import {
  PacketType,
  createBannedPacket,
  createConnectionClosedPacket,
  createInvalidPacketPacket,
  createNotWhitelistedPacket,
  type Packet,
} from "./packets.js";
import { withTimeout } from "./utils/timeout.js";

export const UNKNOWN_REMOTE_ADDRESS = "Unknown";

export const CloseReason = {
  BANNED: "banned",
  NOT_WHITELISTED: "not whitelisted",
  TOO_MANY_INVALID_PACKETS: "too many invalid packets",
  SHUTDOWN: "server shutting down",
} as const;

/** What a handler needs from the listener that accepted it. */
export interface ConnectionGate {
  isBanned(address: string): boolean;
  isWhitelisted(address: string): boolean;
  unregisterHandler(handler: ConnectionHandler): void;
}

export type ConnectionHandlerOptions = {
  id: string;
  stream: Duplex | null | undefined;
  remoteAddress?: string | null;
  gate: ConnectionGate;
  /** Read on start and on every refresh tick. */
  settings: () => Partial<ConnectionSettings>;
  router: MessageRouter;
  logger: Logger;
  onStateChange?: (next: ConnectionState, previous: ConnectionState) => void;
};

type TerminalState = "CLOSED" | "BANNED" | "REJECTED";

/**
 * Drives one accepted connection: gate it, read packets until it closes,
 * then tear it down exactly once.
 */
export class ConnectionHandler {
  readonly id: string;
  readonly remoteAddress: string;

  private readonly stream: Duplex;
  private readonly writer: ConnectionWriter;
  private readonly reader: PacketReader;
  private readonly abort = new AbortController();
  private state: ConnectionState = "HANDSHAKE";
  private invalidPackets = 0;
  private retryLimit: number;
  private refreshIntervalMs: number;
  private refreshTimer: NodeJS.Timeout | null = null;
  private username: string | null = null;
  private running: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private closeReason: string | undefined;

  constructor(private readonly options: ConnectionHandlerOptions) {
    const remoteAddress = options.remoteAddress?.trim() || UNKNOWN_REMOTE_ADDRESS;
    if (!options.stream) {
      throw new ConnectionSetupError(`Could not connect to [${remoteAddress}]: The stream is missing`);
    }
    if (!options.stream.readable || !options.stream.writable) {
      throw new ConnectionSetupError(`Could not connect to [${remoteAddress}]: The stream is not open`);
    }
    this.id = options.id;
    this.remoteAddress = remoteAddress;
    this.stream = options.stream;
    const settings = options.settings();
    this.retryLimit = resolveRetriesOnInvalidPackets(settings.retriesOnInvalidPackets);
    this.refreshIntervalMs = resolveConnectionRefreshIntervalMillis(
      settings.connectionRefreshIntervalMillis,
    );
    this.writer = new ConnectionWriter(this.stream);
    this.reader = new PacketReader(this.stream, { maxRecordBytes: settings.maxRecordBytes });
    this.stream.on("error", this.onStreamError);
  }

  getState(): ConnectionState {
    return this.state;
  }

  isClosed(): boolean {
    return TERMINAL_CONNECTION_STATES.has(this.state);
  }

  getUsername(): string | null {
    return this.username;
  }

  getCloseReason(): string | undefined {
    return this.closeReason;
  }

  getInvalidPacketCount(): number {
    return this.invalidPackets;
  }

  getConnectionRefreshIntervalMillis(): number {
    return this.refreshIntervalMs;
  }

  getRetriesOnInvalidPackets(): number {
    return this.retryLimit;
  }

  /** Sends a packet on this connection's writer. */
  send(packet: Packet): Promise<void> {
    return this.writer.send(packet);
  }

  /** Runs the connection to completion. Repeated calls share one run. */
  run(): Promise<void> {
    this.running ??= this.execute();
    return this.running;
  }

  /**
   * Starts the close sequence, or joins the one already under way. Safe to
   * call from outside the connection's own run.
   */
  close(reason?: string): Promise<void> {
    return this.shutdown(reason, "CLOSED");
  }

  /** Drops the connection without notifying the peer. */
  terminate(): void {
    this.abort.abort();
    this.stopRefreshTimer();
    this.reader.close();
    this.stream.destroy();
    this.closing ??= Promise.resolve();
    this.finish("CLOSED");
  }

  private async execute(): Promise<void> {
    const { gate, logger } = this.options;
    if (this.closing) {
      return this.closing;
    }
    logger.info(`${this.remoteAddress} tries to establish a connection to the server`);
    try {
      if (gate.isBanned(this.remoteAddress)) {
        await this.writer.send(createBannedPacket());
        await this.shutdown(CloseReason.BANNED, "BANNED");
        return;
      }
      if (!gate.isWhitelisted(this.remoteAddress)) {
        await this.writer.send(createNotWhitelistedPacket());
        await this.shutdown(CloseReason.NOT_WHITELISTED, "REJECTED");
        return;
      }
      this.transition("ACTIVE");
      this.scheduleRefresh();
      await this.readLoop();
    } catch (err) {
      if (!this.abort.signal.aborted || !isAbortError(err)) {
        logger.error(`An error occurred while connected to [${this.remoteAddress}]: ${describeError(err)}`);
      }
    } finally {
      await this.close();
    }
  }

  private async readLoop(): Promise<void> {
    const { router } = this.options;
    while (!this.closing) {
      const record = await this.reader.next(this.abort.signal);
      if (record === null) {
        return;
      }
      if (!record.ok) {
        await this.handleInvalidRecord(record.error.message, record.raw);
        continue;
      }
      const packet = record.packet;
      if (packet.packet_type === PacketType.USERNAME) {
        this.username = packet.username;
      }
      await router.route(packet, {
        connectionId: this.id,
        remoteAddress: this.remoteAddress,
        username: this.username,
        send: (reply) => this.writer.send(reply),
      });
    }
  }

  private async handleInvalidRecord(error: string, raw: string) {
    this.invalidPackets += 1;
    const remaining = this.retryLimit - this.invalidPackets;
    this.options.logger.warn(
      `Invalid packet from ${this.remoteAddress} (${this.invalidPackets}/${this.retryLimit}): ${error} ${raw}`,
    );
    if (remaining <= 0) {
      await this.close(CloseReason.TOO_MANY_INVALID_PACKETS);
      return;
    }
    await this.writer.send(createInvalidPacketPacket(error, remaining));
  }

  private shutdown(reason: string | undefined, terminal: TerminalState): Promise<void> {
    this.closing ??= this.performClose(reason, terminal);
    return this.closing;
  }

  private async performClose(reason: string | undefined, terminal: TerminalState): Promise<void> {
    const { logger } = this.options;
    this.closeReason = reason;
    if (terminal === "CLOSED") {
      this.transition("CLOSING");
    }
    this.abort.abort();
    this.stopRefreshTimer();

    // A peer that stops reading never acknowledges a write.
    const { closeTimeoutMillis } = effectiveConnectionSettings(this.options.settings());
    try {
      await withTimeout(
        this.writer.send(createConnectionClosedPacket(reason)),
        closeTimeoutMillis,
        `notify timed out after ${closeTimeoutMillis}ms`,
      );
    } catch (err) {
      logger.info(`Could not notify [${this.remoteAddress}] about the closing connection: ${describeError(err)}`);
    }
    try {
      await withTimeout(
        this.writer.close(),
        closeTimeoutMillis,
        `writer did not close within ${closeTimeoutMillis}ms`,
      );
    } catch (err) {
      logger.info(`Info while closing connection to [${this.remoteAddress}]: writer: ${describeError(err)}`);
    }
    try {
      this.reader.close();
    } catch (err) {
      logger.info(`Info while closing connection to [${this.remoteAddress}]: reader: ${describeError(err)}`);
    }
    try {
      this.stream.destroy();
    } catch (err) {
      logger.info(`Info while closing connection to [${this.remoteAddress}]: stream: ${describeError(err)}`);
    }
    this.finish(terminal);
  }

  private finish(terminal: TerminalState) {
    if (this.isClosed()) {
      return;
    }
    try {
      this.options.gate.unregisterHandler(this);
    } finally {
      this.options.logger.info(
        `Closing connection with ${this.remoteAddress}${this.closeReason ? ` Reason: ${this.closeReason}` : ""}`,
      );
      this.transition(terminal);
    }
  }

  private transition(next: ConnectionState) {
    const previous = this.state;
    if (previous === next || TERMINAL_CONNECTION_STATES.has(previous)) {
      return;
    }
    this.state = next;
    this.options.onStateChange?.(next, previous);
  }

  private scheduleRefresh() {
    this.stopRefreshTimer();
    if (this.refreshIntervalMs <= 0 || this.closing) {
      return;
    }
    this.refreshTimer = setInterval(() => this.refreshSettings(), this.refreshIntervalMs);
    this.refreshTimer.unref();
  }

  /** Re-reads the retry limit and refresh interval from the live config. */
  refreshSettings(): void {
    const settings = this.options.settings();
    this.retryLimit = resolveRetriesOnInvalidPackets(settings.retriesOnInvalidPackets);
    const interval = resolveConnectionRefreshIntervalMillis(settings.connectionRefreshIntervalMillis);
    if (interval !== this.refreshIntervalMs) {
      this.refreshIntervalMs = interval;
      if (this.state === "ACTIVE") {
        this.scheduleRefresh();
      }
    }
  }

  private stopRefreshTimer() {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  private readonly onStreamError = (err: Error) => {
    if (this.closing) {
      this.options.logger.info(`Stream error after close on [${this.remoteAddress}]: ${err.message}`);
      return;
    }
    if (this.state === "ACTIVE") {
      // The pending read rejects with this error and the read loop reports it.
      return;
    }
    this.options.logger.error(`Connection error on [${this.remoteAddress}]: ${err.message}`);
    this.close().catch((closeErr: unknown) => {
      this.options.logger.error(`Failed to close [${this.remoteAddress}]: ${describeError(closeErr)}`);
    });
  };
}
