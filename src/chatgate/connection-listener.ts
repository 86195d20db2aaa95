import { randomUUID } from "node:crypto";
import net from "node:net";
import type { Duplex } from "node:stream";

import { WebSocketServer, createWebSocketStream } from "ws";

import type { ChatgateTransport } from "../config/types.chatgate.js";
import { normalizeAddress } from "./access-control.js";
import {
  CloseReason,
  ConnectionHandler,
  UNKNOWN_REMOTE_ADDRESS,
  type ConnectionGate,
} from "./connection-handler.js";
import type { ConnectionSettings, ConnectionState, Logger, MessageRouter } from "./domain.js";
import { describeError } from "./errors.js";
import { settlesWithin } from "./utils/timeout.js";

export interface AccessQueries {
  isBanned(address: string): boolean;
  isWhitelisted(address: string): boolean;
}

export type ConnectionStateChange = {
  connectionId: string;
  remoteAddress: string;
  next: ConnectionState;
  previous: ConnectionState;
};

export type ConnectionListenerOptions = {
  access: AccessQueries;
  settings: () => Partial<ConnectionSettings>;
  router: MessageRouter;
  logger: Logger;
  transport?: ChatgateTransport;
  port?: number;
  bindAddress?: string;
  onStateChange?: (change: ConnectionStateChange) => void;
};

const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

/**
 * Accepts connections, gates them through the access-control queries and
 * keeps the registry of live handlers.
 */
export class ConnectionListener implements ConnectionGate {
  private readonly handlers = new Map<string, ConnectionHandler>();
  private tcpServer: net.Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: ConnectionListenerOptions) {}

  /** Binds the transport. Rejects when the address cannot be bound. */
  async start(): Promise<void> {
    if (this.tcpServer || this.wsServer) {
      return;
    }
    if (this.stopping) {
      throw new Error("Listener has been stopped");
    }
    const port = this.options.port ?? 0;
    const host = this.options.bindAddress ?? "127.0.0.1";
    if (this.options.transport === "websocket") {
      await this.startWebSocket(port, host);
    } else {
      await this.startTcp(port, host);
    }
    this.options.logger.info(
      `Accepting ${this.options.transport ?? "tcp"} connections on ${host}:${this.getPort()}`,
    );
  }

  /**
   * Hands a newly arrived connection to its own handler. Returns null when
   * the handler could not be set up; the stream is destroyed in that case.
   */
  accept(stream: Duplex | null | undefined, remoteAddress?: string | null): ConnectionHandler | null {
    const { logger } = this.options;
    if (this.stopping) {
      stream?.destroy();
      return null;
    }
    const id = randomUUID();
    const address = remoteAddress ? normalizeAddress(remoteAddress) : null;
    let handler: ConnectionHandler;
    try {
      handler = new ConnectionHandler({
        id,
        stream,
        remoteAddress: address,
        gate: this,
        settings: this.options.settings,
        router: this.options.router,
        logger,
        onStateChange: (next, previous) =>
          this.options.onStateChange?.({
            connectionId: id,
            remoteAddress: address || UNKNOWN_REMOTE_ADDRESS,
            next,
            previous,
          }),
      });
    } catch (err) {
      logger.error(`Failed to set up connection: ${describeError(err)}`);
      stream?.destroy();
      return null;
    }
    this.registerHandler(handler);
    handler.run().catch((err: unknown) => {
      logger.error(`Connection ${handler.remoteAddress} ended with an error: ${describeError(err)}`);
    });
    return handler;
  }

  isBanned(address: string): boolean {
    return this.options.access.isBanned(address);
  }

  isWhitelisted(address: string): boolean {
    return this.options.access.isWhitelisted(address);
  }

  registerHandler(handler: ConnectionHandler): void {
    this.handlers.set(handler.id, handler);
  }

  unregisterHandler(handler: ConnectionHandler): void {
    if (this.handlers.get(handler.id) === handler) {
      this.handlers.delete(handler.id);
    }
  }

  getHandlers(): ConnectionHandler[] {
    return Array.from(this.handlers.values());
  }

  getConnectionCount(): number {
    return this.handlers.size;
  }

  /**
   * Closes live connections whose address the current lists no longer admit.
   * Resolves with the number of connections closed.
   */
  async enforceAccessControl(): Promise<number> {
    const closes: Promise<void>[] = [];
    for (const handler of this.handlers.values()) {
      if (handler.getState() !== "ACTIVE") {
        continue;
      }
      if (this.isBanned(handler.remoteAddress)) {
        closes.push(handler.close(CloseReason.BANNED));
      } else if (!this.isWhitelisted(handler.remoteAddress)) {
        closes.push(handler.close(CloseReason.NOT_WHITELISTED));
      }
    }
    await Promise.all(closes);
    return closes.length;
  }

  getPort(): number {
    const address = this.tcpServer?.address() ?? this.wsServer?.address();
    if (!address || typeof address === "string") {
      return this.options.port ?? 0;
    }
    return address.port;
  }

  /**
   * Stops accepting, closes every live connection and releases the
   * transport. Connections that do not close in time are terminated.
   */
  stop(): Promise<void> {
    this.stopping ??= this.performStop();
    return this.stopping;
  }

  private async performStop(): Promise<void> {
    const { logger } = this.options;
    const timeoutMs = this.options.settings().closeTimeoutMillis ?? DEFAULT_CLOSE_TIMEOUT_MS;
    const handlers = this.getHandlers();
    if (handlers.length > 0) {
      logger.info(`Closing ${handlers.length} connection(s)`);
    }
    const closed = await settlesWithin(
      Promise.allSettled(handlers.map((handler) => handler.close(CloseReason.SHUTDOWN))),
      timeoutMs,
    );
    if (!closed) {
      const remaining = this.getHandlers();
      logger.warn(`${remaining.length} connection(s) did not close within ${timeoutMs}ms; terminating`);
      for (const handler of remaining) {
        handler.terminate();
      }
    }
    await this.closeTransport(timeoutMs);
  }

  private async closeTransport(timeoutMs: number) {
    const closeWithTimeout = async (fn: (cb: () => void) => void, label: string) => {
      const done = await settlesWithin(new Promise<void>((resolve) => fn(resolve)), timeoutMs);
      if (!done) {
        this.options.logger.warn(`Timed out closing ${label} after ${timeoutMs}ms`);
      }
    };
    const tcpServer = this.tcpServer;
    const wsServer = this.wsServer;
    this.tcpServer = null;
    this.wsServer = null;
    if (tcpServer) {
      await closeWithTimeout((cb) => tcpServer.close(() => cb()), "tcp server");
    }
    if (wsServer) {
      for (const client of wsServer.clients) {
        client.terminate();
      }
      await closeWithTimeout((cb) => wsServer.close(() => cb()), "websocket server");
    }
  }

  private startTcp(port: number, host: string): Promise<void> {
    const server = net.createServer((socket) => {
      this.accept(socket, socket.remoteAddress);
    });
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (err) => this.options.logger.error(`TCP listener error: ${err.message}`));
        this.tcpServer = server;
        resolve();
      });
    });
  }

  private startWebSocket(port: number, host: string): Promise<void> {
    const wss = new WebSocketServer({ port, host });
    wss.on("connection", (ws, req) => {
      this.accept(createWebSocketStream(ws), req.socket.remoteAddress);
    });
    return new Promise((resolve, reject) => {
      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        wss.on("error", (err) => this.options.logger.error(`WebSocket listener error: ${err.message}`));
        this.wsServer = wss;
        resolve();
      });
    });
  }
}
