import type pino from "pino";
import type { ClientMessage, RelayMessage } from "./protocol.js";
import {
  RoomRegistry,
  type JoinResult,
  type LeaveResult,
  type RelayResult,
} from "./room-registry.js";
import type { Participant, RoomEvent } from "./types.js";

export interface RoutableSession extends Participant {
  readonly room: string | null;
}

export type RoutableMessage = Exclude<ClientMessage, { type: "ping" }>;

export type RouteOutcome =
  | { type: "join"; result: JoinResult }
  | { type: "leave"; result: LeaveResult }
  | { type: "relay"; result: RelayResult };

export interface RouterStats {
  relayed: number;
  dropped: number;
}

/**
 * Entry point for every cross-session effect. Sessions hand messages to the
 * router; the router drives the registry and delivers whatever the registry
 * emits straight into the addressed session's mailbox.
 */
export class MessageRouter {
  readonly registry: RoomRegistry;
  private readonly logger: pino.Logger;
  private readonly counters: RouterStats = { relayed: 0, dropped: 0 };

  constructor(options: { logger: pino.Logger; now?: () => number }) {
    this.logger = options.logger.child({ module: "router" });
    this.registry = new RoomRegistry({
      dispatch: (to, event) => this.deliver(to, event),
      now: options.now,
    });
  }

  route(session: RoutableSession, message: RoutableMessage, raw: string): RouteOutcome {
    switch (message.type) {
      case "join":
        return { type: "join", result: this.join(session, message.payload.room) };
      case "leave":
        return { type: "leave", result: this.leave(session) };
      default:
        return { type: "relay", result: this.relay(session, message, raw) };
    }
  }

  join(session: RoutableSession, room: string): JoinResult {
    const result = this.registry.join(room, session);
    this.logger.info(
      { room, sessionId: session.id, identity: session.identity, result: result.type },
      result.type === "joined" ? "room_joined" : "room_join_rejected"
    );
    return result;
  }

  leave(session: RoutableSession): LeaveResult {
    if (!session.room) {
      return { removed: false, roomDeleted: false };
    }
    const result = this.registry.leave(session.room, session.id);
    if (result.removed) {
      this.logger.info(
        { room: session.room, sessionId: session.id, roomDeleted: result.roomDeleted },
        "room_left"
      );
    }
    return result;
  }

  stats(): RouterStats {
    return { ...this.counters };
  }

  private relay(session: RoutableSession, message: RelayMessage, raw: string): RelayResult {
    const result: RelayResult = session.room
      ? this.registry.relay(session.room, session.id, { type: message.type, raw })
      : "no-peer";

    if (result === "delivered") {
      this.counters.relayed += 1;
      this.logger.debug({ room: session.room, sessionId: session.id, type: message.type }, "signal_relayed");
    } else {
      this.counters.dropped += 1;
      this.logger.debug({ room: session.room, sessionId: session.id, type: message.type }, "signal_dropped");
    }
    return result;
  }

  private deliver(to: Participant, event: RoomEvent): void {
    try {
      to.push(event);
    } catch (error) {
      this.logger.error({ err: error, sessionId: to.id, event: event.type }, "dispatch_failed");
    }
  }
}
