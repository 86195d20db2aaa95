import { createSubsystemLogger } from "../logging.js";
import type { ChatgateServerOptions, Logger } from "./domain.js";
import { createChatgateServer } from "./server.js";

export type ChatgateServiceHandle = {
  port: number;
  stop: () => Promise<void>;
};

export async function startChatgateService(
  params: ChatgateServerOptions = {},
): Promise<ChatgateServiceHandle> {
  const logger: Logger = params.logger ?? createSubsystemLogger("chatgate");
  const server = await createChatgateServer({ ...params, logger });
  await server.start();
  const port = server.getPort();
  logger.info(`[chatgate] listening on port ${port}`);
  return {
    port,
    stop: async () => {
      await server.stop();
    },
  };
}
