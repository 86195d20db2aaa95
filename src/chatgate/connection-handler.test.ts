import { describe, expect, it, vi } from "vitest";

import { ConnectionHandler, type ConnectionGate } from "./connection-handler.js";
import type { ConnectionSettings, ConnectionState, MessageRouter, RouteContext } from "./domain.js";
import { ConnectionSetupError } from "./errors.js";
import { createUsernamePacket, type Packet } from "./packets.js";
import { FakeSocket, createRecordingLogger, silentLogger, waitFor } from "./test-helpers.js";

function createGate(params: { banned?: boolean; whitelisted?: boolean } = {}) {
  return {
    isBanned: vi.fn(() => params.banned ?? false),
    isWhitelisted: vi.fn(() => params.whitelisted ?? true),
    unregisterHandler: vi.fn<(handler: ConnectionHandler) => void>(),
  } satisfies ConnectionGate;
}

const nullRouter: MessageRouter = { route: () => {} };

function createHandler(
  params: {
    gate?: ConnectionGate;
    settings?: () => Partial<ConnectionSettings>;
    router?: MessageRouter;
    logger?: ReturnType<typeof createRecordingLogger>;
    socket?: FakeSocket;
  } = {},
) {
  const socket = params.socket ?? new FakeSocket();
  const transitions: Array<[ConnectionState, ConnectionState]> = [];
  const handler = new ConnectionHandler({
    id: "conn-1",
    stream: socket,
    remoteAddress: "10.0.0.1",
    gate: params.gate ?? createGate(),
    settings: params.settings ?? (() => ({})),
    router: params.router ?? nullRouter,
    logger: params.logger ?? silentLogger,
    onStateChange: (next, previous) => transitions.push([next, previous]),
  });
  return { handler, socket, transitions };
}

describe("ConnectionHandler", () => {
  it("refuses construction without a stream", () => {
    expect(
      () =>
        new ConnectionHandler({
          id: "conn-1",
          stream: null,
          gate: createGate(),
          settings: () => ({}),
          router: nullRouter,
          logger: silentLogger,
        }),
    ).toThrow(new ConnectionSetupError("Could not connect to [Unknown]: The stream is missing"));
  });

  it("refuses construction on a closed stream", () => {
    const socket = new FakeSocket();
    socket.destroy();
    expect(() => createHandler({ socket })).toThrow(ConnectionSetupError);
  });

  it("sends Banned and closes a banned peer", async () => {
    const gate = createGate({ banned: true });
    const { handler, socket, transitions } = createHandler({ gate });

    await handler.run();

    expect(socket.records()).toEqual([
      { packet_type: "BANNED" },
      { packet_type: "CONNECTION_CLOSED", reason: "banned" },
    ]);
    expect(handler.getState()).toBe("BANNED");
    expect(handler.isClosed()).toBe(true);
    expect(transitions).toEqual([["BANNED", "HANDSHAKE"]]);
    expect(gate.unregisterHandler).toHaveBeenCalledTimes(1);
    expect(socket.destroyed).toBe(true);
  });

  it("lets the ban win over the whitelist", async () => {
    const gate = createGate({ banned: true, whitelisted: true });
    const { handler, socket } = createHandler({ gate });
    await handler.run();
    expect(socket.records()[0]).toEqual({ packet_type: "BANNED" });
    expect(handler.getState()).toBe("BANNED");
    expect(gate.isWhitelisted).not.toHaveBeenCalled();
  });

  it("rejects a peer missing from the whitelist", async () => {
    const gate = createGate({ whitelisted: false });
    const { handler, socket } = createHandler({ gate });
    await handler.run();
    expect(socket.records()).toEqual([
      { packet_type: "NOT_WHITELISTED" },
      { packet_type: "CONNECTION_CLOSED", reason: "not whitelisted" },
    ]);
    expect(handler.getState()).toBe("REJECTED");
    expect(handler.getCloseReason()).toBe("not whitelisted");
  });

  it("closes once under repeated and concurrent close requests", async () => {
    const gate = createGate();
    const logger = createRecordingLogger();
    const { handler, socket, transitions } = createHandler({ gate, logger });
    const running = handler.run();
    expect(handler.getState()).toBe("ACTIVE");

    const first = handler.close("maintenance");
    const second = handler.close("other");
    expect(second).toBe(first);
    await Promise.all([first, second, handler.close(), running]);

    expect(socket.records()).toEqual([{ packet_type: "CONNECTION_CLOSED", reason: "maintenance" }]);
    expect(gate.unregisterHandler).toHaveBeenCalledTimes(1);
    expect(transitions).toEqual([
      ["ACTIVE", "HANDSHAKE"],
      ["CLOSING", "ACTIVE"],
      ["CLOSED", "CLOSING"],
    ]);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("Closing connection with 10.0.0.1 Reason: maintenance");
  });

  it("closes after the configured number of invalid packets", async () => {
    const { handler, socket } = createHandler({ settings: () => ({ retriesOnInvalidPackets: 3 }) });
    const running = handler.run();

    socket.feed("junk1\n");
    socket.feed("junk2\n");
    await waitFor(() => handler.getInvalidPacketCount() === 2);
    await waitFor(() => socket.records().length === 2);
    expect(handler.getState()).toBe("ACTIVE");

    socket.feed("junk3\n");
    await running;

    expect(socket.records()).toEqual([
      { packet_type: "INVALID_PACKET", message: "Unexpected data outside of a packet", remainingRetries: 2 },
      { packet_type: "INVALID_PACKET", message: "Unexpected data outside of a packet", remainingRetries: 1 },
      { packet_type: "CONNECTION_CLOSED", reason: "too many invalid packets" },
    ]);
    expect(handler.getState()).toBe("CLOSED");
  });

  it("falls back to defaults for out-of-range settings", () => {
    const { handler } = createHandler({
      settings: () => ({ connectionRefreshIntervalMillis: -5, retriesOnInvalidPackets: 0 }),
    });
    expect(handler.getConnectionRefreshIntervalMillis()).toBe(1_000);
    expect(handler.getRetriesOnInvalidPackets()).toBe(3);
  });

  it("picks up changed settings on refresh", async () => {
    let retries = 2;
    const { handler } = createHandler({
      settings: () => ({ connectionRefreshIntervalMillis: 10, retriesOnInvalidPackets: retries }),
    });
    const running = handler.run();
    expect(handler.getRetriesOnInvalidPackets()).toBe(2);
    retries = 6;
    await waitFor(() => handler.getRetriesOnInvalidPackets() === 6);
    await handler.close();
    await running;
  });

  it("routes packets with the connection context", async () => {
    const seen: Array<{ packet: Packet; username: string | null }> = [];
    const router: MessageRouter = {
      route: async (packet: Packet, context: RouteContext) => {
        seen.push({ packet, username: context.username });
        if (packet.packet_type === "CLIENT_MESSAGE") {
          await context.send(createUsernamePacket("echo"));
        }
      },
    };
    const { handler, socket } = createHandler({ router });
    const running = handler.run();

    socket.feed('{"packet_type":"USERNAME","username":"ana"}\n');
    socket.feed('{"packet_type":"CLIENT_MESSAGE","message":"hi","encrypted":false,"chat":"lobby"}\n');
    await waitFor(() => socket.records().length === 1);

    expect(handler.getUsername()).toBe("ana");
    expect(seen.map((entry) => [entry.packet.packet_type, entry.username])).toEqual([
      ["USERNAME", "ana"],
      ["CLIENT_MESSAGE", "ana"],
    ]);
    expect(socket.records()).toEqual([{ packet_type: "USERNAME", username: "echo" }]);

    await handler.close();
    await running;
  });

  it("closes without a reason when the peer hangs up", async () => {
    const { handler, socket } = createHandler();
    const running = handler.run();
    socket.endInput();
    await running;
    expect(socket.records()).toEqual([{ packet_type: "CONNECTION_CLOSED" }]);
    expect(handler.getState()).toBe("CLOSED");
    expect(handler.getCloseReason()).toBeUndefined();
  });

  it("reports a stream failure and closes", async () => {
    const logger = createRecordingLogger();
    const gate = createGate();
    const { handler, socket } = createHandler({ logger, gate });
    const running = handler.run();
    socket.destroy(new Error("reset"));
    await running;
    expect(logger.error).toHaveBeenCalledWith("An error occurred while connected to [10.0.0.1]: reset");
    expect(handler.getState()).toBe("CLOSED");
    expect(gate.unregisterHandler).toHaveBeenCalledTimes(1);
  });

  it("terminates without notifying the peer", async () => {
    const gate = createGate();
    const { handler, socket } = createHandler({ gate });
    const running = handler.run();
    handler.terminate();
    await running;
    expect(socket.records()).toEqual([]);
    expect(handler.getState()).toBe("CLOSED");
    expect(gate.unregisterHandler).toHaveBeenCalledTimes(1);
  });
});
