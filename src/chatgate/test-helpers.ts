import { Duplex } from "node:stream";

import { vi } from "vitest";

import type { Logger } from "./domain.js";

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createRecordingLogger() {
  return {
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

export function createDeferred<T = void>() {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function flushMicrotasks(count = 5) {
  for (let i = 0; i < count; i += 1) {
    await Promise.resolve();
  }
}

/** Resolves on the next macrotask, after pending I/O callbacks. */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(check: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * In-memory socket. Text pushed with `feed()` is what the server reads;
 * everything the server writes is collected in `written`.
 */
export class FakeSocket extends Duplex {
  readonly written: string[] = [];

  _read() {}

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.written.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    callback();
  }

  feed(text: string): void {
    this.push(text);
  }

  endInput(): void {
    this.push(null);
  }

  output(): string {
    return this.written.join("");
  }

  /** Parsed records written so far, one per line. */
  records(): unknown[] {
    return this.output()
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line): unknown => JSON.parse(line));
  }
}
