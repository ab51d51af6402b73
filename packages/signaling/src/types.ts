/**
 * Signaling connection types and interfaces.
 *
 * A room pairs at most two sessions. Each session reaches the transport only
 * through a SessionConnection, and other sessions only through the room
 * registry, which pushes RoomEvents into the addressed session's Mailbox.
 */

export type PeerRole = "offerer" | "answerer";

export type SessionState =
  | "connecting"
  | "authenticated"
  | "awaiting-peer"
  | "paired"
  | "closed";

export type RelayMessageType = "offer" | "answer" | "ice-candidate";

export interface SessionConnection {
  /** Bytes queued on the socket but not yet written to the network. */
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface PeerInfo {
  id: string;
  identity: string;
  role: PeerRole;
}

/** A relayed frame, forwarded as the exact text the sender wrote. */
export interface RelayFrame {
  type: RelayMessageType;
  raw: string;
}

export type RoomEvent =
  | { type: "joined"; room: string; role: PeerRole; seq: number }
  | { type: "peer-joined"; room: string; peer: PeerInfo; seq: number }
  | { type: "peer-left"; room: string; peer: PeerInfo; seq: number }
  | { type: "relay"; room: string; from: string; frame: RelayFrame };

export interface Mailbox {
  push(event: RoomEvent): void;
}

export interface Participant extends Mailbox {
  readonly id: string;
  readonly identity: string;
}

export const CloseCode = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
  internalError: 1011,
  tryAgainLater: 1013,
  idleTimeout: 4408,
} as const;
