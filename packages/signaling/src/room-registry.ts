import type {
  Participant,
  PeerInfo,
  PeerRole,
  RelayFrame,
  RoomEvent,
} from "./types.js";

export const ROOM_CAPACITY = 2;

export type JoinResult =
  | { type: "joined"; role: PeerRole; seq: number; peer: PeerInfo | null }
  | { type: "room-full" }
  | { type: "already-joined" };

export interface LeaveResult {
  removed: boolean;
  roomDeleted: boolean;
}

export type RelayResult = "delivered" | "no-peer";

export type Dispatch = (to: Participant, event: RoomEvent) => void;

export interface RoomSnapshot {
  name: string;
  seq: number;
  createdAt: number;
  occupants: PeerInfo[];
}

interface Occupant {
  participant: Participant;
  role: PeerRole;
  joinedAt: number;
}

interface Room {
  name: string;
  occupants: Map<string, Occupant>;
  seq: number;
  createdAt: number;
}

function toPeerInfo(occupant: Occupant): PeerInfo {
  return {
    id: occupant.participant.id,
    identity: occupant.participant.identity,
    role: occupant.role,
  };
}

function otherOccupant(room: Room, sessionId: string): Occupant | undefined {
  for (const [id, occupant] of room.occupants) {
    if (id !== sessionId) return occupant;
  }
  return undefined;
}

const defaultDispatch: Dispatch = (to, event) => to.push(event);

/**
 * Process-wide room state.
 *
 * Every method mutates synchronously and only then dispatches the events it
 * produced, in order, through a single outbox. A dispatch that re-enters the
 * registry (a session closing because its socket failed mid-send) queues its
 * own events behind the ones already pending instead of interleaving with
 * them, so each occupant sees lifecycle events in sequence order.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();
  private readonly outbox: Array<{ to: Participant; event: RoomEvent }> = [];
  private draining = false;
  private readonly dispatch: Dispatch;
  private readonly now: () => number;

  constructor(options: { dispatch?: Dispatch; now?: () => number } = {}) {
    this.dispatch = options.dispatch ?? defaultDispatch;
    this.now = options.now ?? Date.now;
  }

  join(roomName: string, participant: Participant): JoinResult {
    const existing = this.rooms.get(roomName);
    if (existing?.occupants.has(participant.id)) {
      return { type: "already-joined" };
    }
    if (existing && existing.occupants.size >= ROOM_CAPACITY) {
      return { type: "room-full" };
    }

    const room = existing ?? this.createRoom(roomName);
    const peer = otherOccupant(room, participant.id);
    const role: PeerRole = peer?.role === "offerer" ? "answerer" : "offerer";
    const occupant: Occupant = { participant, role, joinedAt: this.now() };
    room.occupants.set(participant.id, occupant);
    room.seq += 1;
    const seq = room.seq;

    this.emit(participant, { type: "joined", room: roomName, role, seq });
    if (peer) {
      this.emit(peer.participant, {
        type: "peer-joined",
        room: roomName,
        peer: toPeerInfo(occupant),
        seq,
      });
      this.emit(participant, {
        type: "peer-joined",
        room: roomName,
        peer: toPeerInfo(peer),
        seq,
      });
    }
    this.flush();

    return { type: "joined", role, seq, peer: peer ? toPeerInfo(peer) : null };
  }

  leave(roomName: string, sessionId: string): LeaveResult {
    const room = this.rooms.get(roomName);
    const occupant = room?.occupants.get(sessionId);
    if (!room || !occupant) {
      return { removed: false, roomDeleted: false };
    }

    room.occupants.delete(sessionId);
    if (room.occupants.size === 0) {
      this.rooms.delete(roomName);
      return { removed: true, roomDeleted: true };
    }

    room.seq += 1;
    const left = toPeerInfo(occupant);
    for (const survivor of room.occupants.values()) {
      this.emit(survivor.participant, {
        type: "peer-left",
        room: roomName,
        peer: left,
        seq: room.seq,
      });
    }
    this.flush();

    return { removed: true, roomDeleted: false };
  }

  relay(roomName: string, fromSessionId: string, frame: RelayFrame): RelayResult {
    const room = this.rooms.get(roomName);
    if (!room || !room.occupants.has(fromSessionId)) {
      return "no-peer";
    }

    const peer = otherOccupant(room, fromSessionId);
    if (!peer) {
      return "no-peer";
    }

    this.emit(peer.participant, {
      type: "relay",
      room: roomName,
      from: fromSessionId,
      frame,
    });
    this.flush();
    return "delivered";
  }

  occupants(roomName: string): PeerInfo[] {
    const room = this.rooms.get(roomName);
    return room ? Array.from(room.occupants.values(), toPeerInfo) : [];
  }

  getRoom(roomName: string): RoomSnapshot | undefined {
    const room = this.rooms.get(roomName);
    if (!room) return undefined;
    return {
      name: room.name,
      seq: room.seq,
      createdAt: room.createdAt,
      occupants: Array.from(room.occupants.values(), toPeerInfo),
    };
  }

  stats(): { rooms: number; participants: number } {
    let participants = 0;
    for (const room of this.rooms.values()) {
      participants += room.occupants.size;
    }
    return { rooms: this.rooms.size, participants };
  }

  private createRoom(name: string): Room {
    const room: Room = {
      name,
      occupants: new Map(),
      seq: 0,
      createdAt: this.now(),
    };
    this.rooms.set(name, room);
    return room;
  }

  private emit(to: Participant, event: RoomEvent): void {
    this.outbox.push({ to, event });
  }

  private flush(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let next = this.outbox.shift();
      while (next) {
        this.dispatch(next.to, next.event);
        next = this.outbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
