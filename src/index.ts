export { createChatgateServer } from "./chatgate/server.js";
export { startChatgateService, type ChatgateServiceHandle } from "./chatgate/service.js";
export { ConnectionListener, type ConnectionListenerOptions } from "./chatgate/connection-listener.js";
export {
  CloseReason,
  ConnectionHandler,
  UNKNOWN_REMOTE_ADDRESS,
  type ConnectionGate,
} from "./chatgate/connection-handler.js";
export { ConnectionWriter } from "./chatgate/connection-writer.js";
export { PacketReader } from "./chatgate/packet-reader.js";
export { createPacketDecoder, type DecodedRecord } from "./chatgate/packet-decoder.js";
export * from "./chatgate/packets.js";
export {
  AccessControlStore,
  AccessList,
  normalizeAddress,
  parseAccessRule,
  type AccessListEntry,
} from "./chatgate/access-control.js";
export { CreateModifyFilter, PathWatcher, fsWatchSource, type WatchEvent } from "./chatgate/path-watcher.js";
export { ChatgateConfigStore } from "./chatgate/config-store.js";
export { resolveChatgateConfig, effectiveConnectionSettings } from "./chatgate/config.js";
export { createKeyedTaskQueue } from "./chatgate/task-queue.js";
export { createLoggingRouter } from "./chatgate/router.js";
export * from "./chatgate/errors.js";
export type {
  ChatgateConfig,
  ChatgateServer,
  ChatgateServerOptions,
  ConnectionSettings,
  ConnectionState,
  Logger,
  MessageRouter,
  RouteContext,
} from "./chatgate/domain.js";
export type { ChatgateConfigInput, ChatgateTransport } from "./config/types.chatgate.js";
export { createSubsystemLogger, setLoggerOverride } from "./logging.js";
