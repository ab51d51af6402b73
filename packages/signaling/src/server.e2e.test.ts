import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { connect as connectTcp } from "node:net";
import pino from "pino";
import WebSocket from "ws";
import { issueToken } from "@pairline/auth";
import { SignalingConfigSchema } from "./config.js";
import { createSignalingServer, type SignalingServer } from "./server.js";
import { createLogger } from "./test-utils/fakes.js";

const SECRET = "test-secret-0123456789";

interface TestClient {
  ws: WebSocket;
  next(): Promise<string>;
  closed: Promise<{ code: number; reason: string }>;
}

function openClient(url: string): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    const queue: string[] = [];
    const waiters: Array<(text: string) => void> = [];

    ws.on("message", (data) => {
      const text = data.toString();
      const waiter = waiters.shift();
      if (waiter) waiter(text);
      else queue.push(text);
    });

    const closed = new Promise<{ code: number; reason: string }>((resolveClose) => {
      ws.once("close", (code, reason) => resolveClose({ code, reason: reason.toString() }));
    });

    ws.once("open", () => {
      resolve({
        ws,
        closed,
        next: () => {
          const queued = queue.shift();
          if (queued !== undefined) return Promise.resolve(queued);
          return new Promise((resolveNext) => waiters.push(resolveNext));
        },
      });
    });
    ws.once("error", reject);
  });
}

function typeOf(text: string): string {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed === "object" && parsed !== null && "type" in parsed) {
    return String(parsed.type);
  }
  return "";
}

describe("signaling server", () => {
  let server: SignalingServer;
  let baseUrl: string;
  let wsUrl: string;
  let running = false;
  const clients: TestClient[] = [];

  const connect = async (path: string, subject: string) => {
    const token = issueToken(SECRET, subject, { expiresIn: "1h" });
    const client = await openClient(`${wsUrl}${path}?token=${encodeURIComponent(token)}`);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    const config = SignalingConfigSchema.parse({
      host: "127.0.0.1",
      port: 0,
      jwtSecret: SECRET,
      environment: "test",
    });
    server = createSignalingServer(config, pino({ level: "silent" }));
    const address = await server.start();
    running = true;
    baseUrl = `http://127.0.0.1:${address.port}`;
    wsUrl = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.ws.terminate();
    }
    if (running) await server.stop();
  });

  test("reports health over HTTP", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ status: "ok", rooms: 0, participants: 0 });
  });

  test("refuses an upgrade without a token with 401", async () => {
    await expect(openClient(`${wsUrl}/ws/room-1`)).rejects.toThrow(
      "Unexpected server response: 401"
    );
  });

  test("refuses an upgrade on an unknown path with 404", async () => {
    const token = issueToken(SECRET, "alice");
    await expect(openClient(`${wsUrl}/other?token=${token}`)).rejects.toThrow(
      "Unexpected server response: 404"
    );
  });

  test("answers an unparseable upgrade target with 400 and keeps serving", async () => {
    const { port } = new URL(baseUrl);
    const reply = await new Promise<string>((resolve, reject) => {
      const socket = connectTcp(Number(port), "127.0.0.1", () => {
        socket.write(
          "GET //[ HTTP/1.1\r\n" +
            "Host: 127.0.0.1\r\n" +
            "Upgrade: websocket\r\n" +
            "Connection: Upgrade\r\n" +
            "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==\r\n" +
            "Sec-WebSocket-Version: 13\r\n\r\n"
        );
      });
      let received = "";
      socket.on("data", (chunk) => {
        received += chunk.toString();
      });
      socket.on("close", () => resolve(received));
      socket.on("error", reject);
    });

    expect(reply.split("\r\n")[0]).toBe("HTTP/1.1 400 Bad Request");
    const health = await fetch(`${baseUrl}/health`);
    expect(health.status).toBe(200);
  });

  test("pairs two clients and relays signaling verbatim", async () => {
    const alice = await connect("/ws/room-1", "alice");
    expect(JSON.parse(await alice.next())).toEqual({
      type: "joined",
      payload: { room: "room-1", role: "offerer", seq: 1 },
    });

    const bob = await connect("/ws", "bob");
    bob.ws.send(JSON.stringify({ type: "join", payload: { room: "room-1" } }));

    expect(JSON.parse(await bob.next())).toEqual({
      type: "joined",
      payload: { room: "room-1", role: "answerer", seq: 2 },
    });
    expect(typeOf(await alice.next())).toBe("peer-joined");
    expect(typeOf(await bob.next())).toBe("peer-joined");

    const offer = JSON.stringify({ type: "offer", payload: { sdp: "v=0 test-offer" } });
    alice.ws.send(offer);
    expect(await bob.next()).toBe(offer);

    const answer = JSON.stringify({ type: "answer", payload: { sdp: "v=0 test-answer" } });
    bob.ws.send(answer);
    expect(await alice.next()).toBe(answer);

    bob.ws.send(JSON.stringify({ type: "leave" }));
    expect(await bob.closed).toEqual({ code: 1000, reason: "leave" });
    const peerLeft: unknown = JSON.parse(await alice.next());
    expect(peerLeft).toMatchObject({ type: "peer-left", payload: { room: "room-1", seq: 3 } });
  });

  test("rejects a third client with room-full", async () => {
    await connect("/ws/room-2", "alice");
    await connect("/ws/room-2", "bob");
    const carol = await connect("/ws/room-2", "carol");

    expect(JSON.parse(await carol.next())).toEqual({
      type: "error",
      payload: { reason: "room-full", message: "Room is full" },
    });
    expect(carol.ws.readyState).toBe(WebSocket.OPEN);
  });

  test("answers ping with pong", async () => {
    const alice = await connect("/ws", "alice");
    alice.ws.send(JSON.stringify({ type: "ping" }));
    expect(JSON.parse(await alice.next())).toEqual({ type: "pong", payload: {} });
  });

  test("closes sessions with 1001 on shutdown", async () => {
    const alice = await connect("/ws/room-3", "alice");
    await alice.next();
    running = false;
    await server.stop();
    expect(await alice.closed).toEqual({ code: 1001, reason: "server_shutdown" });
  });
});

describe("signaling server request logging", () => {
  test("logs each HTTP request once it has been answered", async () => {
    const logger = createLogger();
    const server = createSignalingServer(
      SignalingConfigSchema.parse({ host: "127.0.0.1", port: 0, jwtSecret: SECRET }),
      logger
    );
    const address = await server.start();

    try {
      const response = await fetch(`http://127.0.0.1:${address.port}/health`);
      expect(response.status).toBe(200);
      await response.json();

      await vi.waitFor(() => {
        expect(logger.info).toHaveBeenCalledWith(
          { method: "GET", path: "/health", status: 200, durationMs: expect.any(Number) },
          "http_request"
        );
      });
    } finally {
      await server.stop();
    }
  });
});
