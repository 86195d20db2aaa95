export class ConnectionSetupError extends Error {
  readonly code = "connection_setup_failed";

  constructor(message: string) {
    super(message);
    this.name = "ConnectionSetupError";
  }
}

export type ProtocolErrorCode = "invalid_packet" | "record_too_large";

export class ProtocolError extends Error {
  constructor(
    public code: ProtocolErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class WriterClosedError extends Error {
  readonly code = "writer_closed";

  constructor(message = "connection writer is closed") {
    super(message);
    this.name = "WriterClosedError";
  }
}

export class ConfigError extends Error {
  readonly code = "invalid_config";

  constructor(
    message: string,
    public filePath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}
