import type { Readable } from "node:stream";

import { createPacketDecoder, type DecodedRecord, type PacketDecoder } from "./packet-decoder.js";

type PendingRead = {
  resolve: (record: DecodedRecord | null) => void;
  reject: (err: Error) => void;
  cleanup: () => void;
};

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const err = new Error("read aborted");
  err.name = "AbortError";
  return err;
}

const DEFAULT_MAX_QUEUED_RECORDS = 16;

/**
 * Inbound half of a connection. Buffers decoded records and hands them out
 * one at a time through `next()`, which resolves `null` at end of stream.
 * The stream is paused while `maxQueuedRecords` records wait to be read and
 * resumed once half of them have been taken.
 */
export class PacketReader {
  private readonly decoder: PacketDecoder;
  private readonly queue: DecodedRecord[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;
  private closed = false;
  private paused = false;
  private readonly maxQueuedRecords: number;

  constructor(
    private readonly stream: Readable,
    options: { maxRecordBytes?: number; maxQueuedRecords?: number } = {},
  ) {
    this.maxQueuedRecords = Math.max(1, options.maxQueuedRecords ?? DEFAULT_MAX_QUEUED_RECORDS);
    this.decoder = createPacketDecoder((record) => this.enqueue(record), options);
    stream.setEncoding("utf8");
    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onEnd);
    stream.on("error", this.onError);
  }

  next(signal?: AbortSignal): Promise<DecodedRecord | null> {
    if (this.pending) {
      return Promise.reject(new Error("a read is already pending"));
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    const queued = this.queue.shift();
    this.resumeIfDrained();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended || this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<DecodedRecord | null>((resolve, reject) => {
      let cleanup = () => {};
      if (signal) {
        const abortSignal = signal;
        const onAbort = () => {
          this.settle((pending) => pending.reject(abortReason(abortSignal)));
        };
        abortSignal.addEventListener("abort", onAbort, { once: true });
        cleanup = () => abortSignal.removeEventListener("abort", onAbort);
      }
      this.pending = { resolve, reject, cleanup };
    });
  }

  /** Detaches from the stream. Pending reads resolve as end of stream. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    this.stream.off("error", this.onError);
    this.queue.length = 0;
    this.settle((pending) => pending.resolve(null));
  }

  private settle(action: (pending: PendingRead) => void) {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.cleanup();
    action(pending);
  }

  private enqueue(record: DecodedRecord) {
    if (this.pending) {
      this.settle((pending) => pending.resolve(record));
      return;
    }
    this.queue.push(record);
    if (!this.paused && this.queue.length >= this.maxQueuedRecords) {
      this.paused = true;
      this.stream.pause();
    }
  }

  private resumeIfDrained() {
    if (this.paused && !this.closed && this.queue.length <= this.maxQueuedRecords / 2) {
      this.paused = false;
      this.stream.resume();
    }
  }

  private readonly onData = (chunk: string | Buffer) => {
    this.decoder.write(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  };

  private readonly onEnd = () => {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.decoder.end();
    this.settle((pending) => pending.resolve(null));
  };

  private readonly onError = (err: Error) => {
    this.failure = err;
    this.settle((pending) => pending.reject(err));
  };
}
