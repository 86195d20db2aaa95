import type { MessageRouter } from "./domain.js";
import { formatPacketType } from "./packets.js";

/** Default router: records receipt and nothing else. */
export function createLoggingRouter(log: (message: string) => void): MessageRouter {
  return {
    route(packet, context) {
      const who = context.username ? `${context.username}@${context.remoteAddress}` : context.remoteAddress;
      log(`Received ${formatPacketType(packet.packet_type)} packet from ${who}`);
    },
  };
}
