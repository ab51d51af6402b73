import { describe, expect, test } from "vitest";
import { ProtocolError } from "./errors.js";
import { encodeServerFrame, parseClientFrame, RoomNameSchema } from "./protocol.js";

const MAX = 1024;

function reasonOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof ProtocolError ? error.reason : "unexpected";
  }
}

describe("parseClientFrame", () => {
  test("decodes each client message type", () => {
    expect(parseClientFrame('{"type":"join","payload":{"room":"r1"}}', MAX)).toEqual({
      type: "join",
      payload: { room: "r1" },
    });
    expect(parseClientFrame('{"type":"offer","payload":{"sdp":"v=0"}}', MAX)).toEqual({
      type: "offer",
      payload: { sdp: "v=0" },
    });
    expect(parseClientFrame('{"type":"answer","payload":{"sdp":"v=0"}}', MAX).type).toBe("answer");
    expect(
      parseClientFrame('{"type":"ice-candidate","payload":{"candidate":"candidate:1 1 udp"}}', MAX)
    ).toEqual({ type: "ice-candidate", payload: { candidate: "candidate:1 1 udp" } });
    expect(parseClientFrame('{"type":"leave"}', MAX).type).toBe("leave");
    expect(parseClientFrame('{"type":"ping","payload":{}}', MAX).type).toBe("ping");
  });

  test("rejects unknown types distinctly from malformed frames", () => {
    expect(reasonOf(() => parseClientFrame('{"type":"chat","payload":{}}', MAX))).toBe(
      "unknown-message"
    );
    expect(reasonOf(() => parseClientFrame('{"type":5,"payload":{}}', MAX))).toBe(
      "unknown-message"
    );
    expect(reasonOf(() => parseClientFrame("not json", MAX))).toBe("invalid-message");
    expect(reasonOf(() => parseClientFrame("null", MAX))).toBe("invalid-message");
    expect(reasonOf(() => parseClientFrame('{"payload":{}}', MAX))).toBe("invalid-message");
  });

  test("rejects empty or missing opaque payloads", () => {
    expect(reasonOf(() => parseClientFrame('{"type":"offer","payload":{"sdp":""}}', MAX))).toBe(
      "invalid-message"
    );
    expect(reasonOf(() => parseClientFrame('{"type":"answer"}', MAX))).toBe("invalid-message");
    expect(
      reasonOf(() => parseClientFrame('{"type":"ice-candidate","payload":{"candidate":42}}', MAX))
    ).toBe("invalid-message");
  });

  test("rejects frames over the byte limit", () => {
    const sdp = "x".repeat(MAX);
    expect(
      reasonOf(() => parseClientFrame(JSON.stringify({ type: "offer", payload: { sdp } }), MAX))
    ).toBe("payload-too-large");
  });

  test("counts bytes, not characters", () => {
    const frame = JSON.stringify({ type: "offer", payload: { sdp: "é".repeat(20) } });
    expect(frame.length).toBeLessThan(64);
    expect(reasonOf(() => parseClientFrame(frame, 64))).toBe("payload-too-large");
  });

  test("rejects room names that could escape the registry key space", () => {
    for (const room of ["", "..", ".", "a/b", "a\\b", "a\u0000b", "room\n", "x".repeat(65)]) {
      expect(
        reasonOf(() => parseClientFrame(JSON.stringify({ type: "join", payload: { room } }), MAX))
      ).toBe("invalid-room");
    }
  });
});

describe("RoomNameSchema", () => {
  test("accepts url-safe names", () => {
    for (const room of ["r1", "team-sync_2", "a.b", "~x", "x".repeat(64)]) {
      expect(RoomNameSchema.safeParse(room).success).toBe(true);
    }
  });
});

describe("encodeServerFrame", () => {
  test("writes a type and payload envelope", () => {
    expect(
      encodeServerFrame({ type: "error", payload: { reason: "no-peer", message: "No peer in room" } })
    ).toBe('{"type":"error","payload":{"reason":"no-peer","message":"No peer in room"}}');
  });
});
