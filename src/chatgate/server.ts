import path from "node:path";

import { createSubsystemLogger } from "../logging.js";
import { AccessControlStore, BANNED_FILENAME, WHITELIST_FILENAME } from "./access-control.js";
import { ChatgateConfigStore } from "./config-store.js";
import { CONFIG_FILENAME } from "./config.js";
import { ConnectionListener } from "./connection-listener.js";
import type { ChatgateServer, ChatgateServerOptions, Logger } from "./domain.js";
import { describeError } from "./errors.js";
import { ensureDir } from "./json-file.js";
import { PathWatcher, type WatchEvent } from "./path-watcher.js";
import { createLoggingRouter } from "./router.js";
import { createKeyedTaskQueue } from "./task-queue.js";
import { settlesWithin } from "./utils/timeout.js";

export async function createChatgateServer(options: ChatgateServerOptions = {}): Promise<ChatgateServer> {
  const subsystem = createSubsystemLogger("chatgate");
  const logger: Logger = options.logger ?? subsystem;
  const listenerLogger: Logger = options.logger ?? subsystem.child("listener");
  const configStore = new ChatgateConfigStore({
    statePath: options.statePath,
    overrides: options.config,
    logger,
  });
  const statePath = configStore.current().statePath;
  await ensureDir(statePath);
  const config = await configStore.load();

  const bannedPath = path.join(statePath, BANNED_FILENAME);
  const whitelistPath = path.join(statePath, WHITELIST_FILENAME);
  const access = new AccessControlStore({
    bannedPath,
    whitelistPath,
    isWhitelistEnabled: () => configStore.current().whitelist.enabled,
    logger,
  });
  await access.load();

  const routerLog = subsystem.child("router");
  const router = options.router ?? createLoggingRouter((message) => routerLog.debug(message));
  const listener = new ConnectionListener({
    access,
    settings: () => configStore.current().connection,
    router,
    logger: listenerLogger,
    transport: config.transport,
    port: config.port,
    bindAddress: config.bindAddress,
  });

  const reloads = createKeyedTaskQueue();

  const reloadAndEnforce = async (label: string, reload: () => Promise<unknown>) => {
    try {
      await reload();
    } catch (err) {
      logger.warn(`Keeping previous ${label}: ${describeError(err)}`);
      return;
    }
    const closed = await listener.enforceAccessControl();
    if (closed > 0) {
      logger.info(`Closed ${closed} connection(s) after ${label} reload`);
    }
  };

  const onStateFileEvent = (event: WatchEvent) => {
    if (event.kind === "OTHER") {
      return;
    }
    const fileName = path.basename(event.path);
    let task: () => Promise<void>;
    switch (fileName) {
      case BANNED_FILENAME:
        task = () => reloadAndEnforce("ban list", () => access.reloadBanned());
        break;
      case WHITELIST_FILENAME:
        task = () => reloadAndEnforce("whitelist", () => access.reloadWhitelist());
        break;
      case CONFIG_FILENAME:
        task = () => reloadAndEnforce("configuration", () => configStore.reload());
        break;
      default:
        return;
    }
    reloads.run(fileName, task).catch((err: unknown) => {
      logger.error(`State file reload failed: ${describeError(err)}`);
    });
  };

  const watcher = new PathWatcher({
    path: statePath,
    onEvent: onStateFileEvent,
    onError: (err) => logger.warn(`Watching ${statePath} failed: ${err.message}`),
    retryDelayMs: config.watcher.retryDelayMillis,
  });

  let started = false;
  let stopped = false;

  return {
    async start() {
      if (started) return;
      if (stopped) {
        throw new Error("Server has been stopped");
      }
      await listener.start();
      watcher.start();
      started = true;
    },
    async stop() {
      if (!started) return;
      stopped = true;
      started = false;
      await watcher.stop();
      const timeoutMs = configStore.current().connection.closeTimeoutMillis;
      if (!(await settlesWithin(reloads.drain(), timeoutMs))) {
        logger.warn(`Pending reloads did not finish within ${timeoutMs}ms`);
      }
      await listener.stop();
      logger.info("Server stopped");
    },
    getPort() {
      return listener.getPort();
    },
    getConnectionCount() {
      return listener.getConnectionCount();
    },
  };
}
