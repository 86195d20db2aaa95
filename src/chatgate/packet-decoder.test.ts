import { describe, expect, it } from "vitest";

import { createPacketDecoder, type DecodedRecord } from "./packet-decoder.js";
import { createBannedPacket, createUsernamePacket } from "./packets.js";

function decodeAll(chunks: string[], options: { maxRecordBytes?: number } = {}) {
  const records: DecodedRecord[] = [];
  const decoder = createPacketDecoder((record) => records.push(record), options);
  for (const chunk of chunks) {
    decoder.write(chunk);
  }
  decoder.end();
  return records;
}

function errors(records: DecodedRecord[]) {
  return records.flatMap((record) =>
    record.ok ? [] : [{ code: record.error.code, message: record.error.message, raw: record.raw }],
  );
}

describe("createPacketDecoder", () => {
  it("decodes records concatenated on one line", () => {
    const records = decodeAll(['{"packet_type":"BANNED"}{"packet_type":"USERNAME","username":"a"}\n']);
    expect(records).toEqual([
      { ok: true, packet: createBannedPacket() },
      { ok: true, packet: createUsernamePacket("a") },
    ]);
  });

  it("joins a record split across chunks", () => {
    const records = decodeAll(['{"packet_type":"US', 'ERNAME","username":"a"}\n']);
    expect(records).toEqual([{ ok: true, packet: createUsernamePacket("a") }]);
  });

  it("accepts records wrapped in an array", () => {
    const records = decodeAll(['[{"packet_type":"BANNED"},{"packet_type":"BANNED"}]\n']);
    expect(records).toEqual([
      { ok: true, packet: createBannedPacket() },
      { ok: true, packet: createBannedPacket() },
    ]);
  });

  it("keeps braces inside strings", () => {
    const records = decodeAll(['{"packet_type":"USERNAME","username":"a}{b"}\n']);
    expect(records).toEqual([{ ok: true, packet: createUsernamePacket("a}{b") }]);
  });

  it("reports garbage once and still decodes the next record", () => {
    const records = decodeAll(['hello {"packet_type":"BANNED"}\n']);
    expect(errors(records)).toEqual([
      { code: "invalid_packet", message: "Unexpected data outside of a packet", raw: "hello" },
    ]);
    expect(records[1]).toEqual({ ok: true, packet: createBannedPacket() });
  });

  it("reports malformed JSON and recovers on the next line", () => {
    const records = decodeAll(['{"packet_type": BANNED}\n{"packet_type":"BANNED"}\n']);
    expect(errors(records)).toEqual([
      { code: "invalid_packet", message: "Malformed JSON", raw: '{"packet_type": BANNED}' },
    ]);
    expect(records[1]).toEqual({ ok: true, packet: createBannedPacket() });
  });

  it("treats a line break inside a record as the end of it", () => {
    const records = decodeAll(['{"packet_type":"BANNED"\n{"packet_type":"BANNED"}\n']);
    expect(errors(records)).toEqual([
      { code: "invalid_packet", message: "Unterminated packet", raw: '{"packet_type":"BANNED"' },
    ]);
    expect(records).toHaveLength(2);
  });

  it("reports schema violations", () => {
    const records = decodeAll(['{"packet_type":"USERNAME"}\n']);
    expect(errors(records)).toEqual([
      { code: "invalid_packet", message: "username: Required", raw: '{"packet_type":"USERNAME"}' },
    ]);
  });

  it("drops an oversized record up to the next line", () => {
    const records = decodeAll(
      ['{"packet_type":"USERNAME","username":"a rather long name"}\n', '{"packet_type":"BANNED"}\n'],
      { maxRecordBytes: 30 },
    );
    expect(records).toHaveLength(2);
    const [first, second] = records;
    expect(first?.ok).toBe(false);
    if (first && !first.ok) {
      expect(first.error.code).toBe("record_too_large");
      expect(first.error.message).toBe("Record exceeded 30 bytes without terminating");
    }
    expect(second).toEqual({ ok: true, packet: createBannedPacket() });
  });

  it("reports a partial record at end of input", () => {
    const records = decodeAll(['{"packet_type"']);
    expect(errors(records)).toEqual([
      { code: "invalid_packet", message: "Unterminated packet", raw: '{"packet_type"' },
    ]);
  });

  it("shortens long raw previews", () => {
    const records = decodeAll([`${"x".repeat(200)}\n`]);
    const [record] = records;
    expect(record?.ok).toBe(false);
    if (record && !record.ok) {
      expect(record.raw).toBe(`${"x".repeat(120)}...`);
    }
  });
});
