import type { Writable } from "node:stream";

import { WriterClosedError } from "./errors.js";
import { encodePacket, type Packet } from "./packets.js";
import { createKeyedTaskQueue, type KeyedTaskQueue } from "./task-queue.js";
import { withTimeout } from "./utils/timeout.js";

const WRITE_KEY = "outbound";
const DEFAULT_END_TIMEOUT_MS = 1_000;

/**
 * Sole owner of the outbound half of a connection. Sends are chained so
 * packets leave in call order and a packet's bytes are never split by
 * another send.
 */
export class ConnectionWriter {
  private readonly queue: KeyedTaskQueue = createKeyedTaskQueue();
  private closing: Promise<void> | null = null;

  constructor(
    private readonly stream: Writable,
    private readonly options: { endTimeoutMs?: number } = {},
  ) {}

  /** Resolves once the stream has accepted the whole packet. */
  send(packet: Packet): Promise<void> {
    if (this.closing) {
      return Promise.reject(new WriterClosedError());
    }
    const data = encodePacket(packet);
    return this.queue.run(WRITE_KEY, () => this.write(data));
  }

  isClosed(): boolean {
    return this.closing !== null;
  }

  /** Ends the stream once pending sends have gone out. Later calls share the first result. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.queue.drain().then(() => this.end());
    }
    return this.closing;
  }

  private write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.stream.destroyed || this.stream.writableEnded) {
        reject(new WriterClosedError("stream is no longer writable"));
        return;
      }
      this.stream.write(data, "utf8", (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private end(): Promise<void> {
    if (this.stream.destroyed || this.stream.writableEnded) {
      return Promise.resolve();
    }
    const timeoutMs = this.options.endTimeoutMs ?? DEFAULT_END_TIMEOUT_MS;
    const ended = new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
    return withTimeout(ended, timeoutMs, `outbound stream did not finish within ${timeoutMs}ms`);
  }
}
