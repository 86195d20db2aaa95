import { z } from "zod";

export const ChatgateConnectionSchema = z
  .object({
    // Out-of-range values are accepted here and replaced by defaults where they are read.
    connectionRefreshIntervalMillis: z.number().int().optional(),
    retriesOnInvalidPackets: z.number().int().optional(),
    maxRecordBytes: z.number().int().positive().optional(),
    closeTimeoutMillis: z.number().int().nonnegative().optional(),
  })
  .strict()
  .optional();

export const ChatgateSchema = z
  .object({
    port: z.number().int().min(0).max(65_535).optional(),
    bindAddress: z.string().min(1).optional(),
    transport: z.enum(["tcp", "websocket"]).optional(),
    whitelist: z
      .object({
        enabled: z.boolean().optional(),
      })
      .strict()
      .optional(),
    connection: ChatgateConnectionSchema,
    watcher: z
      .object({
        retryDelayMillis: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
