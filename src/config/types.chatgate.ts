export type ChatgateTransport = "tcp" | "websocket";

/** Shape of chatgate.json and of programmatic overrides. Every key is optional. */
export type ChatgateConfigInput = {
  port?: number;
  bindAddress?: string;
  transport?: ChatgateTransport;
  whitelist?: {
    enabled?: boolean;
  };
  connection?: {
    connectionRefreshIntervalMillis?: number;
    retriesOnInvalidPackets?: number;
    maxRecordBytes?: number;
    closeTimeoutMillis?: number;
  };
  watcher?: {
    retryDelayMillis?: number;
  };
};
