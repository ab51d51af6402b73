import express from "express";
import { createServer as createHTTPServer, STATUS_CODES, type IncomingMessage } from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import type pino from "pino";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { createTokenVerifier, type TokenVerifier } from "@pairline/auth";
import type { SignalingConfig } from "./config.js";
import { TransportError } from "./errors.js";
import { RateLimiter } from "./rate-limiter.js";
import { MessageRouter } from "./router.js";
import { SignalingSession } from "./session.js";
import { CloseCode, type SessionConnection } from "./types.js";
import { createUpgradeGate, type UpgradeRefusal } from "./upgrade-gate.js";

export interface SignalingServerDeps {
  verify?: TokenVerifier;
  now?: () => number;
}

export interface SignalingServer {
  readonly router: MessageRouter;
  readonly limiter: RateLimiter;
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
  sessionCount(): number;
}

function bufferFromWsData(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function rejectUpgrade(socket: Duplex, refusal: UpgradeRefusal): void {
  const body = JSON.stringify({ error: refusal.reason });
  socket.write(
    `HTTP/1.1 ${refusal.status} ${STATUS_CODES[refusal.status] ?? ""}\r\n` +
      "Connection: close\r\n" +
      "Content-Type: application/json\r\n" +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      "\r\n" +
      body
  );
  socket.destroy();
}

function socketConnection(ws: WebSocket, onSendError: (error: Error) => void): SessionConnection {
  return {
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    send(data) {
      ws.send(data, (error) => {
        if (error) onSendError(error);
      });
    },
    close(code, reason) {
      ws.close(code, reason);
    },
  };
}

/**
 * HTTP + WebSocket front end for the signaling core.
 *
 * - GET /health reports room and session counts.
 * - Upgrades to /ws or /ws/<room> pass through the upgrade gate (origin,
 *   transport security, address rate, token, identity rate) and are refused
 *   with a plain HTTP status before any session exists.
 */
export function createSignalingServer(
  config: SignalingConfig,
  rootLogger: pino.Logger,
  deps: SignalingServerDeps = {}
): SignalingServer {
  const logger = rootLogger.child({ module: "signaling-server" });
  const now = deps.now ?? Date.now;
  const verify = deps.verify ?? createTokenVerifier(config.jwtSecret);
  const limiter = new RateLimiter(config.rateLimit, now);
  const router = new MessageRouter({ logger: rootLogger, now });
  const sessions = new Set<SignalingSession>();
  const gate = createUpgradeGate({
    verify,
    limiter,
    allowedOrigins: config.allowedOrigins,
    trustProxy: config.trustProxy,
    requireSecureTransport: config.requireSecureTransport,
  });

  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const startedAt = now();
    res.on("finish", () => {
      logger.info(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: now() - startedAt },
        "http_request"
      );
    });
    next();
  });

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (
      origin &&
      (config.allowedOrigins === "*" || config.allowedOrigins.includes(origin))
    ) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
      res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    }
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  app.get("/", (_req, res) => {
    res.type("text/plain").send("Pairline signaling server");
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      ...router.registry.stats(),
      sessions: sessions.size,
      ...router.stats(),
    });
  });

  const httpServer = createHTTPServer(app);
  const wss = new WebSocketServer({
    noServer: true,
    // Hard transport cap; frames between maxPayloadBytes and this get a
    // non-fatal payload-too-large from the session instead of a 1009 close.
    maxPayload: config.maxPayloadBytes * 4,
  });

  const handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const decision = gate({
      url: req.url,
      headers: req.headers,
      remoteAddress: req.socket.remoteAddress,
      encrypted: "encrypted" in req.socket && req.socket.encrypted === true,
    });

    if (!decision.ok) {
      logger.info(
        { status: decision.status, reason: decision.reason, remoteAddress: req.socket.remoteAddress },
        "upgrade_refused"
      );
      rejectUpgrade(socket, decision);
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const connection = socketConnection(ws, (error) => {
        session.handleError(
          new TransportError("send_failed", CloseCode.internalError, { cause: error })
        );
      });
      const session = new SignalingSession({
        identity: decision.identity.subject,
        connection,
        router,
        limiter,
        limits: {
          maxPayloadBytes: config.maxPayloadBytes,
          maxBufferedBytes: config.maxBufferedBytes,
          idleTimeoutMs: config.idleTimeoutMs,
        },
        logger: rootLogger,
        initialRoom: decision.room,
        now,
      });
      sessions.add(session);

      ws.on("message", (data, isBinary) => {
        session.handleFrame(bufferFromWsData(data), isBinary);
      });
      ws.on("pong", () => {
        session.touch();
      });
      ws.on("close", (code) => {
        sessions.delete(session);
        session.close(code === 1005 ? CloseCode.normal : code, "transport_closed");
      });
      ws.on("error", (error) => {
        session.handleError(
          new TransportError("transport_error", CloseCode.internalError, { cause: error })
        );
      });

      session.start();
    });
  };

  httpServer.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    try {
      handleUpgrade(req, socket, head);
    } catch (error) {
      logger.error({ err: error, remoteAddress: req.socket.remoteAddress }, "upgrade_failed");
      if (!socket.destroyed) {
        rejectUpgrade(socket, { ok: false, status: 400, reason: "bad_request" });
      }
    }
  });

  let heartbeat: ReturnType<typeof setInterval> | null = null;

  const runHeartbeat = () => {
    for (const ws of wss.clients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      try {
        ws.ping();
      } catch (error) {
        logger.warn({ err: error }, "heartbeat_ping_failed");
      }
    }
    const swept = limiter.sweep();
    if (swept > 0) {
      logger.debug({ swept }, "rate_limit_buckets_swept");
    }
  };

  return {
    router,
    limiter,

    sessionCount() {
      return sessions.size;
    },

    start() {
      return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
          httpServer.off("listening", onListening);
          reject(err);
        };
        const onListening = () => {
          httpServer.off("error", onError);
          const address = httpServer.address();
          if (!address || typeof address === "string") {
            reject(new Error("Signaling server is not listening on a TCP port"));
            return;
          }
          heartbeat = setInterval(runHeartbeat, config.heartbeatIntervalMs);
          logger.info(
            { host: address.address, port: address.port },
            `Signaling server listening on http://${address.address}:${address.port}`
          );
          resolve(address);
        };
        httpServer.once("error", onError);
        httpServer.once("listening", onListening);
        httpServer.listen(config.port, config.host);
      });
    },

    async stop() {
      if (heartbeat) {
        clearInterval(heartbeat);
        heartbeat = null;
      }

      for (const session of Array.from(sessions)) {
        session.close(CloseCode.goingAway, "server_shutdown");
      }
      sessions.clear();

      await new Promise<void>((resolve) => {
        const timeout = setTimeout(() => {
          for (const ws of wss.clients) ws.terminate();
        }, 1500);
        wss.close(() => {
          clearTimeout(timeout);
          resolve();
        });
      });

      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
      logger.info("signaling_server_stopped");
    },
  };
}
