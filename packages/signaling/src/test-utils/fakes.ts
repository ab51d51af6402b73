import { vi } from "vitest";
import type pino from "pino";
import type { Participant, RoomEvent, SessionConnection } from "../types.js";

export class RecordingParticipant implements Participant {
  readonly events: RoomEvent[] = [];

  constructor(
    readonly id: string,
    readonly identity: string = id
  ) {}

  push(event: RoomEvent): void {
    this.events.push(event);
  }

  eventTypes(): string[] {
    return this.events.map((event) => event.type);
  }
}

export class FakeConnection implements SessionConnection {
  bufferedAmount = 0;
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  failNextSend = false;

  send(data: string): void {
    if (this.failNextSend) {
      this.failNextSend = false;
      throw new Error("socket write failed");
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closed ??= { code, reason };
  }

  frames(): Array<{ type: string; payload?: unknown }> {
    return this.sent.map((data) => JSON.parse(data) as { type: string; payload?: unknown });
  }

  lastFrame(): { type: string; payload?: unknown } | undefined {
    return this.frames().at(-1);
  }
}

export function createLogger(): pino.Logger {
  const logger = {
    child: vi.fn(() => logger),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
  return logger as unknown as pino.Logger;
}
