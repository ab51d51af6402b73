import { z } from "zod";
import { ProtocolError, type ErrorReason } from "./errors.js";
import type { PeerInfo, PeerRole } from "./types.js";

export const ROOM_NAME_MAX_LENGTH = 64;

/**
 * Room names become registry keys and may arrive as a URL path segment, so
 * separators, control characters and dot-segments are rejected outright.
 */
export const RoomNameSchema = z
  .string()
  .min(1)
  .max(ROOM_NAME_MAX_LENGTH)
  .regex(/^[A-Za-z0-9_.~-]+$/)
  .refine((name) => name !== "." && name !== "..");

const OpaqueBlobSchema = z.string().min(1);

const EmptyPayloadSchema = z.object({}).passthrough().optional();

export const JoinMessageSchema = z.object({
  type: z.literal("join"),
  payload: z.object({ room: z.string() }),
});

export const OfferMessageSchema = z.object({
  type: z.literal("offer"),
  payload: z.object({ sdp: OpaqueBlobSchema }),
});

export const AnswerMessageSchema = z.object({
  type: z.literal("answer"),
  payload: z.object({ sdp: OpaqueBlobSchema }),
});

export const IceCandidateMessageSchema = z.object({
  type: z.literal("ice-candidate"),
  payload: z.object({ candidate: OpaqueBlobSchema }),
});

export const LeaveMessageSchema = z.object({
  type: z.literal("leave"),
  payload: EmptyPayloadSchema,
});

export const PingMessageSchema = z.object({
  type: z.literal("ping"),
  payload: EmptyPayloadSchema,
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  JoinMessageSchema,
  OfferMessageSchema,
  AnswerMessageSchema,
  IceCandidateMessageSchema,
  LeaveMessageSchema,
  PingMessageSchema,
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage["type"];
export type RelayMessage = Extract<
  ClientMessage,
  { type: "offer" | "answer" | "ice-candidate" }
>;

const CLIENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ClientMessageType>([
  "join",
  "offer",
  "answer",
  "ice-candidate",
  "leave",
  "ping",
]);

const EnvelopeSchema = z.object({ type: z.unknown() }).passthrough();

export function isRelayMessage(message: ClientMessage): message is RelayMessage {
  return (
    message.type === "offer" ||
    message.type === "answer" ||
    message.type === "ice-candidate"
  );
}

/**
 * Decode one inbound text frame. Throws ProtocolError for anything the
 * session should answer with an error frame.
 */
export function parseClientFrame(text: string, maxBytes: number): ClientMessage {
  if (Buffer.byteLength(text, "utf8") > maxBytes) {
    throw new ProtocolError(
      "payload-too-large",
      `Frame exceeds ${maxBytes} bytes`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ProtocolError("invalid-message", "Frame is not valid JSON");
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success || envelope.data.type === undefined) {
    throw new ProtocolError("invalid-message", "Frame has no type");
  }
  const { type } = envelope.data;
  if (typeof type !== "string" || !CLIENT_MESSAGE_TYPES.has(type)) {
    throw new ProtocolError("unknown-message", "Unknown message type");
  }

  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProtocolError(
      "invalid-message",
      `Invalid ${envelope.data.type} payload`
    );
  }

  const message = parsed.data;
  if (message.type === "join" && !RoomNameSchema.safeParse(message.payload.room).success) {
    throw new ProtocolError("invalid-room", "Invalid room name");
  }
  return message;
}

export type ServerFrame =
  | { type: "joined"; payload: { room: string; role: PeerRole; seq: number } }
  | { type: "peer-joined"; payload: { room: string; peer: PeerInfo; seq: number } }
  | { type: "peer-left"; payload: { room: string; peer: PeerInfo; seq: number } }
  | { type: "error"; payload: { reason: ErrorReason; message: string } }
  | { type: "pong"; payload: Record<string, never> };

export function encodeServerFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
