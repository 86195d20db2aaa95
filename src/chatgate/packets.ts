/**
 * Chatgate wire packets.
 *
 * Every packet is a JSON object whose `packet_type` names its kind, written
 * one record per line. Packets are frozen on construction.
 */

import { z } from "zod";

export const PacketType = {
  BANNED: "BANNED",
  NOT_WHITELISTED: "NOT_WHITELISTED",
  CONNECTION_CLOSED: "CONNECTION_CLOSED",
  USERNAME: "USERNAME",
  CLIENT_MESSAGE: "CLIENT_MESSAGE",
  INVALID_PACKET: "INVALID_PACKET",
} as const;

export type PacketTypeValue = (typeof PacketType)[keyof typeof PacketType];

// ============================================================================
// Packet kinds
// ============================================================================

export interface BannedPacket {
  readonly packet_type: "BANNED";
}

export interface NotWhitelistedPacket {
  readonly packet_type: "NOT_WHITELISTED";
}

export interface ConnectionClosedPacket {
  readonly packet_type: "CONNECTION_CLOSED";
  /** Omitted when the connection closes without a reason. */
  readonly reason?: string;
}

export interface UsernamePacket {
  readonly packet_type: "USERNAME";
  readonly username: string;
}

export interface ClientMessagePacket {
  readonly packet_type: "CLIENT_MESSAGE";
  readonly message: string;
  /** Carried through untouched; payload encryption is not implemented. */
  readonly encrypted: boolean;
  readonly chat: string;
}

export interface InvalidPacketPacket {
  readonly packet_type: "INVALID_PACKET";
  readonly message: string;
  readonly remainingRetries: number;
}

export type Packet =
  | BannedPacket
  | NotWhitelistedPacket
  | ConnectionClosedPacket
  | UsernamePacket
  | ClientMessagePacket
  | InvalidPacketPacket;

export type PacketOf<T extends PacketTypeValue> = Extract<Packet, { packet_type: T }>;

// ============================================================================
// Factories
// ============================================================================

export function createBannedPacket(): BannedPacket {
  return Object.freeze({ packet_type: PacketType.BANNED });
}

export function createNotWhitelistedPacket(): NotWhitelistedPacket {
  return Object.freeze({ packet_type: PacketType.NOT_WHITELISTED });
}

export function createConnectionClosedPacket(reason?: string | null): ConnectionClosedPacket {
  if (reason === undefined || reason === null) {
    return Object.freeze({ packet_type: PacketType.CONNECTION_CLOSED });
  }
  return Object.freeze({ packet_type: PacketType.CONNECTION_CLOSED, reason });
}

export function createUsernamePacket(username: string): UsernamePacket {
  return Object.freeze({ packet_type: PacketType.USERNAME, username });
}

export function createClientMessagePacket(params: {
  message: string;
  encrypted: boolean;
  chat: string;
}): ClientMessagePacket {
  return Object.freeze({
    packet_type: PacketType.CLIENT_MESSAGE,
    message: params.message,
    encrypted: params.encrypted,
    chat: params.chat,
  });
}

export function createInvalidPacketPacket(message: string, remainingRetries: number): InvalidPacketPacket {
  return Object.freeze({
    packet_type: PacketType.INVALID_PACKET,
    message,
    remainingRetries: Math.max(0, remainingRetries),
  });
}

// ============================================================================
// Validation
// ============================================================================

const BannedSchema = z.object({ packet_type: z.literal(PacketType.BANNED) }).strict();

const NotWhitelistedSchema = z
  .object({ packet_type: z.literal(PacketType.NOT_WHITELISTED) })
  .strict();

const ConnectionClosedSchema = z
  .object({
    packet_type: z.literal(PacketType.CONNECTION_CLOSED),
    reason: z.string().optional(),
  })
  .strict();

const UsernameSchema = z
  .object({
    packet_type: z.literal(PacketType.USERNAME),
    username: z.string(),
  })
  .strict();

const ClientMessageSchema = z
  .object({
    packet_type: z.literal(PacketType.CLIENT_MESSAGE),
    message: z.string(),
    encrypted: z.boolean(),
    chat: z.string(),
  })
  .strict();

const InvalidPacketSchema = z
  .object({
    packet_type: z.literal(PacketType.INVALID_PACKET),
    message: z.string(),
    remainingRetries: z.number().int().nonnegative(),
  })
  .strict();

export const PacketSchema = z.discriminatedUnion("packet_type", [
  BannedSchema,
  NotWhitelistedSchema,
  ConnectionClosedSchema,
  UsernameSchema,
  ClientMessageSchema,
  InvalidPacketSchema,
]);

export type ParsePacketResult = { ok: true; packet: Packet } | { ok: false; error: string };

function toPacket(parsed: z.infer<typeof PacketSchema>): Packet {
  switch (parsed.packet_type) {
    case PacketType.BANNED:
      return createBannedPacket();
    case PacketType.NOT_WHITELISTED:
      return createNotWhitelistedPacket();
    case PacketType.CONNECTION_CLOSED:
      return createConnectionClosedPacket(parsed.reason);
    case PacketType.USERNAME:
      return createUsernamePacket(parsed.username);
    case PacketType.CLIENT_MESSAGE:
      return createClientMessagePacket(parsed);
    case PacketType.INVALID_PACKET:
      return createInvalidPacketPacket(parsed.message, parsed.remainingRetries);
  }
}

export function parsePacket(value: unknown): ParsePacketResult {
  const result = PacketSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, error: `${where}${issue?.message ?? "invalid packet"}` };
  }
  return { ok: true, packet: toPacket(result.data) };
}

export function isPacketOfType<T extends PacketTypeValue>(
  packet: Packet,
  type: T,
): packet is PacketOf<T> {
  return packet.packet_type === type;
}

// ============================================================================
// Serialization
// ============================================================================

export function encodePacket(packet: Packet): string {
  return JSON.stringify(packet) + "\n";
}

/**
 * Human-readable label for a packet type, e.g. `NOT_WHITELISTED` becomes
 * "Not whitelisted". Used in log lines only.
 */
export function formatPacketType(type: PacketTypeValue | string): string {
  if (type.length === 0) {
    return type;
  }
  return type.charAt(0).toUpperCase() + type.slice(1).toLowerCase().replace(/_/g, " ");
}
