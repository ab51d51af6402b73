import { randomUUID } from "node:crypto";
import type pino from "pino";
import {
  AdmissionError,
  isRecoverable,
  PairingError,
  ProtocolError,
  TransportError,
  type ErrorReason,
} from "./errors.js";
import {
  encodeServerFrame,
  isRelayMessage,
  parseClientFrame,
  type ClientMessage,
  type ServerFrame,
} from "./protocol.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { MessageRouter } from "./router.js";
import {
  CloseCode,
  type Participant,
  type PeerRole,
  type RoomEvent,
  type SessionConnection,
  type SessionState,
} from "./types.js";

export interface SessionLimits {
  maxPayloadBytes: number;
  maxBufferedBytes: number;
  idleTimeoutMs: number;
}

export interface SignalingSessionOptions {
  id?: string;
  identity: string;
  connection: SessionConnection;
  router: MessageRouter;
  limiter: RateLimiter;
  limits: SessionLimits;
  logger: pino.Logger;
  /** Room named in the connection path, joined as soon as the session starts. */
  initialRoom?: string | null;
  now?: () => number;
}

const PAIRING_MESSAGES: Record<PairingError["reason"], string> = {
  "room-full": "Room is full",
  "no-peer": "No peer in room",
  "already-joined": "Already joined a room",
};

/**
 * Server-side state machine for one connected client.
 *
 * connecting -> authenticated -> awaiting-peer <-> paired -> closed, with a
 * direct edge to closed from every state. Only auth, admission and transport
 * failures (plus an explicit leave) end the connection; protocol and pairing
 * problems are answered with an error frame and the session carries on.
 */
export class SignalingSession implements Participant {
  readonly id: string;
  readonly identity: string;
  readonly connectedAt: number;

  private currentState: SessionState = "connecting";
  private currentRoom: string | null = null;
  private currentRole: PeerRole | null = null;
  private joinedAt: number | null = null;
  private lastActivity: number;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly connection: SessionConnection;
  private readonly router: MessageRouter;
  private readonly limiter: RateLimiter;
  private readonly limits: SessionLimits;
  private readonly logger: pino.Logger;
  private readonly initialRoom: string | null;
  private readonly now: () => number;

  constructor(options: SignalingSessionOptions) {
    this.id = options.id ?? randomUUID();
    this.identity = options.identity;
    this.connection = options.connection;
    this.router = options.router;
    this.limiter = options.limiter;
    this.limits = options.limits;
    this.initialRoom = options.initialRoom ?? null;
    this.now = options.now ?? Date.now;
    this.connectedAt = this.now();
    this.lastActivity = this.connectedAt;
    this.logger = options.logger.child({
      module: "session",
      sessionId: this.id,
      identity: this.identity,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get room(): string | null {
    return this.currentRoom;
  }

  get role(): PeerRole | null {
    return this.currentRole;
  }

  get joinedRoomAt(): number | null {
    return this.joinedAt;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  start(): void {
    if (this.currentState !== "connecting") return;
    this.currentState = "authenticated";
    this.armIdleTimer();
    this.logger.info({ initialRoom: this.initialRoom }, "session_opened");

    const initialRoom = this.initialRoom;
    if (initialRoom) {
      this.runGuarded(() => this.join(initialRoom));
    }
  }

  /** Record liveness: any inbound frame, ping or protocol-level pong. */
  touch(): void {
    if (this.currentState === "closed") return;
    this.lastActivity = this.now();
    this.armIdleTimer();
  }

  handleFrame(data: string | Buffer, isBinary = false): void {
    if (this.currentState === "connecting" || this.currentState === "closed") return;
    this.touch();

    if (!this.limiter.admit(`id:${this.identity}`, "message")) {
      this.handleError(new AdmissionError("message", this.identity));
      return;
    }

    this.runGuarded(() => {
      if (isBinary) {
        throw new ProtocolError("invalid-message", "Binary frames are not supported");
      }
      const text = typeof data === "string" ? data : data.toString("utf8");
      const message = parseClientFrame(text, this.limits.maxPayloadBytes);
      this.dispatch(message, text);
    });
  }

  /** Mailbox: events pushed by the registry through the router. */
  push(event: RoomEvent): void {
    if (this.currentState === "closed") return;

    switch (event.type) {
      case "joined":
        this.currentRoom = event.room;
        this.currentRole = event.role;
        this.joinedAt = this.now();
        this.currentState = "awaiting-peer";
        this.send({
          type: "joined",
          payload: { room: event.room, role: event.role, seq: event.seq },
        });
        return;
      case "peer-joined":
        this.currentState = "paired";
        this.send({
          type: "peer-joined",
          payload: { room: event.room, peer: event.peer, seq: event.seq },
        });
        return;
      case "peer-left":
        this.currentState = "awaiting-peer";
        this.send({
          type: "peer-left",
          payload: { room: event.room, peer: event.peer, seq: event.seq },
        });
        return;
      case "relay":
        this.write(event.frame.raw);
        return;
    }
  }

  handleError(error: unknown): void {
    if (this.currentState === "closed") return;

    if (isRecoverable(error)) {
      this.logger.debug({ reason: error.reason }, "session_request_rejected");
      this.sendError(error.reason, error.message);
      return;
    }
    if (error instanceof AdmissionError) {
      this.logger.warn({ kind: error.kind }, "session_rate_limited");
      this.sendError(error.reason, error.message);
      this.close(CloseCode.policyViolation, "rate_limited");
      return;
    }
    if (error instanceof TransportError) {
      this.logger.warn({ err: error.cause ?? error, closeCode: error.closeCode }, "session_transport_failed");
      this.close(error.closeCode, error.message);
      return;
    }

    this.logger.error({ err: error }, "session_frame_failed");
    this.close(CloseCode.internalError, "internal_error");
  }

  /**
   * Terminal transition. Leaves the room (the peer gets peer-left), stops the
   * idle timer and releases the connection. Safe to call repeatedly.
   */
  close(code: number = CloseCode.normal, reason = "closed"): void {
    if (this.currentState === "closed") return;
    const room = this.currentRoom;
    this.currentState = "closed";
    this.clearIdleTimer();

    if (room) {
      this.router.leave(this);
      this.currentRoom = null;
    }

    try {
      this.connection.close(code, reason);
    } catch (error) {
      this.logger.warn({ err: error }, "session_close_failed");
    }
    this.logger.info(
      { code, reason, room, durationMs: this.now() - this.connectedAt },
      "session_closed"
    );
  }

  private dispatch(message: ClientMessage, raw: string): void {
    if (message.type === "ping") {
      this.send({ type: "pong", payload: {} });
      return;
    }

    if (message.type === "leave") {
      this.close(CloseCode.normal, "leave");
      return;
    }

    if (message.type === "join") {
      this.join(message.payload.room);
      return;
    }

    if (isRelayMessage(message)) {
      if (this.currentState !== "paired") {
        throw new PairingError("no-peer", PAIRING_MESSAGES["no-peer"]);
      }
      const outcome = this.router.route(this, message, raw);
      if (outcome.type === "relay" && outcome.result === "no-peer") {
        throw new PairingError("no-peer", PAIRING_MESSAGES["no-peer"]);
      }
    }
  }

  private join(room: string): void {
    if (this.currentRoom) {
      throw new PairingError("already-joined", PAIRING_MESSAGES["already-joined"]);
    }

    const result = this.router.join(this, room);
    if (result.type === "room-full") {
      this.currentState = "awaiting-peer";
      throw new PairingError("room-full", PAIRING_MESSAGES["room-full"]);
    }
    if (result.type === "already-joined") {
      throw new PairingError("already-joined", PAIRING_MESSAGES["already-joined"]);
    }
  }

  private runGuarded(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.handleError(error);
    }
  }

  private sendError(reason: ErrorReason, message: string): void {
    this.send({ type: "error", payload: { reason, message } });
  }

  private send(frame: ServerFrame): void {
    this.write(encodeServerFrame(frame));
  }

  private write(data: string): void {
    if (this.currentState === "closed") return;

    if (this.connection.bufferedAmount > this.limits.maxBufferedBytes) {
      this.handleError(
        new TransportError("outbound_buffer_exceeded", CloseCode.tryAgainLater)
      );
      return;
    }

    try {
      this.connection.send(data);
    } catch (error) {
      this.handleError(
        new TransportError("send_failed", CloseCode.internalError, { cause: error })
      );
    }
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.handleError(new TransportError("idle_timeout", CloseCode.idleTimeout));
    }, this.limits.idleTimeoutMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
