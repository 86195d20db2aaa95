import { ProtocolError, type ProtocolErrorCode } from "./errors.js";
import { parsePacket, type Packet } from "./packets.js";

export const DEFAULT_MAX_RECORD_BYTES = 64 * 1024;

export type DecodedRecord =
  | { ok: true; packet: Packet }
  | { ok: false; error: ProtocolError; raw: string };

export type DecodedRecordCallback = (record: DecodedRecord) => void;

export interface PacketDecoder {
  write(chunk: string): void;
  /** Reports whatever partial record is still buffered. Call at end of stream. */
  end(): void;
}

const RAW_PREVIEW_LENGTH = 120;

function preview(raw: string): string {
  return raw.length > RAW_PREVIEW_LENGTH ? `${raw.slice(0, RAW_PREVIEW_LENGTH)}...` : raw;
}

function isSeparator(char: string): boolean {
  return char === " " || char === "\t" || char === "\r" || char === "," || char === "[" || char === "]";
}

/**
 * Streaming, lenient record decoder.
 *
 * Records are top-level JSON objects. They may be concatenated on one line,
 * wrapped in an array, or split across chunks. Anything else between
 * records is reported as a single invalid record per run, and decoding picks
 * up again at the next `{` or the next line.
 */
export function createPacketDecoder(
  onRecord: DecodedRecordCallback,
  options: { maxRecordBytes?: number } = {},
): PacketDecoder {
  const maxRecordBytes = options.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES;

  let record = "";
  let depth = 0;
  let inString = false;
  let escaped = false;
  let garbage = "";
  let discarding = false;

  const reject = (raw: string, message: string, code: ProtocolErrorCode = "invalid_packet") => {
    onRecord({ ok: false, error: new ProtocolError(code, message), raw: preview(raw) });
  };

  const flushGarbage = () => {
    const trimmed = garbage.trim();
    garbage = "";
    if (trimmed.length > 0) {
      reject(trimmed, "Unexpected data outside of a packet");
    }
  };

  const resetRecord = () => {
    record = "";
    depth = 0;
    inString = false;
    escaped = false;
  };

  const completeRecord = () => {
    const raw = record;
    resetRecord();
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      reject(raw, "Malformed JSON");
      return;
    }
    const result = parsePacket(parsed);
    if (result.ok) {
      onRecord({ ok: true, packet: result.packet });
    } else {
      reject(raw, result.error);
    }
  };

  const overflow = (raw: string) => {
    reject(raw, `Record exceeded ${maxRecordBytes} bytes without terminating`, "record_too_large");
    resetRecord();
    garbage = "";
    discarding = true;
  };

  const consume = (char: string) => {
    if (discarding) {
      if (char === "\n") {
        discarding = false;
      }
      return;
    }

    if (depth > 0) {
      if (char === "\n") {
        // Records never span lines on this wire; resynchronize on the next one.
        reject(record, "Unterminated packet");
        resetRecord();
        return;
      }
      record += char;
      if (record.length > maxRecordBytes) {
        overflow(record);
        return;
      }
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (char === "\\") {
          escaped = true;
        } else if (char === '"') {
          inString = false;
        }
        return;
      }
      if (char === '"') {
        inString = true;
      } else if (char === "{") {
        depth += 1;
      } else if (char === "}") {
        depth -= 1;
        if (depth === 0) {
          completeRecord();
        }
      }
      return;
    }

    if (char === "{") {
      flushGarbage();
      record = char;
      depth = 1;
      return;
    }
    if (char === "\n") {
      flushGarbage();
      return;
    }
    if (garbage.length === 0 && isSeparator(char)) {
      return;
    }
    garbage += char;
    if (garbage.length > maxRecordBytes) {
      overflow(garbage);
    }
  };

  return {
    write(chunk: string) {
      for (const char of chunk) {
        consume(char);
      }
    },
    end() {
      if (depth > 0) {
        reject(record, "Unterminated packet");
        resetRecord();
      }
      flushGarbage();
      discarding = false;
    },
  };
}
