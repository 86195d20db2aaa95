import { existsSync, statSync, watch } from "node:fs";
import path from "node:path";

export type WatchEventKind = "CREATED" | "MODIFIED" | "OTHER";

export type WatchEvent = {
  kind: WatchEventKind;
  /** Absolute path of the entry the notification is about. */
  path: string;
};

export type WatchSourceHandlers = {
  onNotification: (event: WatchEvent) => void;
  onError: (err: Error) => void;
};

export type WatchHandle = { close: () => void };

/** Establishes a watch on `target`. Throws when the watch cannot be set up. */
export type WatchSource = (target: string, handlers: WatchSourceHandlers) => WatchHandle;

/** Collapses the metadata-then-content writes editors make for one save. */
export const QUIESCENCE_WINDOW_MS = 100;
/** A modify this soon after a create is treated as part of the create. */
export const CREATE_SUPPRESSION_WINDOW_MS = 100;
export const DEFAULT_WATCH_RETRY_DELAY_MS = 1_000;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * `fs.watch` backed source. Watching a directory reports its entries;
 * watching a file reports the file itself.
 */
export const fsWatchSource: WatchSource = (target, handlers) => {
  const baseDir = statSync(target).isDirectory() ? target : path.dirname(target);
  const watcher = watch(target, { persistent: false }, (eventType, filename) => {
    const eventPath = path.resolve(baseDir, filename ? String(filename) : path.basename(target));
    let kind: WatchEventKind = "OTHER";
    if (eventType === "change") {
      kind = "MODIFIED";
    } else if (existsSync(eventPath)) {
      kind = "CREATED";
    }
    handlers.onNotification({ kind, path: eventPath });
    if (!existsSync(target)) {
      handlers.onError(new Error(`Watched path ${target} no longer exists`));
    }
  });
  watcher.on("error", (err) => handlers.onError(err));
  return { close: () => watcher.close() };
};

/**
 * Tracks recently created paths so the modify notification that follows a
 * create for the same path is not dispatched a second time.
 */
export class CreateModifyFilter {
  private readonly recentlyCreated = new Map<string, number>();

  constructor(
    private readonly windowMs = CREATE_SUPPRESSION_WINDOW_MS,
    private readonly now: () => number = Date.now,
  ) {}

  /** Returns true when the event should be dispatched. */
  accept(event: WatchEvent): boolean {
    if (event.kind === "CREATED") {
      this.recentlyCreated.set(event.path, this.now());
      return true;
    }
    if (event.kind === "MODIFIED") {
      const createdAt = this.recentlyCreated.get(event.path);
      if (createdAt !== undefined && this.now() - createdAt <= this.windowMs) {
        return false;
      }
      this.recentlyCreated.delete(event.path);
      return true;
    }
    return true;
  }

  prune(): void {
    const now = this.now();
    for (const [trackedPath, createdAt] of this.recentlyCreated) {
      if (now - createdAt > this.windowMs) {
        this.recentlyCreated.delete(trackedPath);
      }
    }
  }

  trackedPaths(): string[] {
    return Array.from(this.recentlyCreated.keys());
  }
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export type PathWatcherOptions = {
  path: string;
  onEvent: (event: WatchEvent) => void;
  onError: (err: Error) => void;
  source?: WatchSource;
  retryDelayMs?: number;
  quiescenceMs?: number;
  suppressionWindowMs?: number;
  now?: () => number;
};

/**
 * Debounced watcher for one filesystem location. The watch loop runs as a
 * task owned by this object; `stop()` aborts every wait in it and resolves
 * once the loop has exited.
 */
export class PathWatcher {
  private readonly source: WatchSource;
  private readonly filter: CreateModifyFilter;
  private task: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private paused = false;
  private pending: WatchEvent[] = [];
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private startedAt: number | null = null;

  constructor(private readonly options: PathWatcherOptions) {
    this.source = options.source ?? fsWatchSource;
    this.filter = new CreateModifyFilter(
      options.suppressionWindowMs ?? CREATE_SUPPRESSION_WINDOW_MS,
      options.now ?? Date.now,
    );
  }

  start(): void {
    if (this.task) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = Date.now();
    this.task = this.run(controller.signal);
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** True while the loop is live and dispatching. */
  isRunning(): boolean {
    return this.task !== null && !this.controller?.signal.aborted && !this.paused;
  }

  getStartTimestamp(): number | null {
    return this.startedAt;
  }

  async stop(): Promise<void> {
    if (!this.task || !this.controller) {
      return;
    }
    this.controller.abort();
    this.notify();
    await this.task;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const retryDelayMs = this.options.retryDelayMs ?? DEFAULT_WATCH_RETRY_DELAY_MS;
    while (!signal.aborted) {
      try {
        await this.watchUntilFailure(signal);
      } catch (err) {
        if (signal.aborted) {
          break;
        }
        this.options.onError(toError(err));
        await pause(retryDelayMs, signal);
      }
    }
  }

  private async watchUntilFailure(signal: AbortSignal): Promise<void> {
    this.failure = null;
    this.pending = [];
    const handle = this.source(this.options.path, {
      onNotification: (event) => {
        this.pending.push(event);
        this.notify();
      },
      onError: (err) => {
        this.failure ??= err;
        this.notify();
      },
    });
    try {
      while (!signal.aborted) {
        await this.waitForNotification(signal);
        this.throwIfFailed();
        if (signal.aborted) {
          return;
        }
        if (!(await pause(this.options.quiescenceMs ?? QUIESCENCE_WINDOW_MS, signal))) {
          return;
        }
        this.throwIfFailed();
        const batch = this.pending.splice(0);
        if (this.paused) {
          continue;
        }
        this.dispatch(batch);
      }
    } finally {
      handle.close();
      this.pending = [];
    }
  }

  private dispatch(batch: WatchEvent[]) {
    this.filter.prune();
    const seen = new Set<string>();
    for (const event of batch) {
      const key = `${event.kind}\u0000${event.path}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      if (!this.filter.accept(event)) {
        continue;
      }
      try {
        this.options.onEvent(event);
      } catch (err) {
        this.options.onError(toError(err));
      }
    }
  }

  private throwIfFailed() {
    const failure = this.failure;
    if (failure) {
      this.failure = null;
      throw failure;
    }
  }

  private waitForNotification(signal: AbortSignal): Promise<void> {
    if (this.pending.length > 0 || this.failure || signal.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private notify() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
