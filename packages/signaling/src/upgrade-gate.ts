import type { IncomingHttpHeaders } from "node:http";
import { authenticateUpgrade, type Identity, type TokenVerifier } from "@pairline/auth";
import { RoomNameSchema } from "./protocol.js";
import type { RateLimiter } from "./rate-limiter.js";

export interface UpgradeRequest {
  url?: string;
  headers: IncomingHttpHeaders;
  remoteAddress?: string;
  /** True when the socket itself is TLS. */
  encrypted: boolean;
}

export type UpgradeRefusal = {
  ok: false;
  status: 400 | 401 | 403 | 404 | 429;
  reason: string;
};

export type UpgradeDecision =
  | { ok: true; identity: Identity; room: string | null; address: string }
  | UpgradeRefusal;

export interface UpgradeGateOptions {
  verify: TokenVerifier;
  limiter: RateLimiter;
  allowedOrigins: "*" | string[];
  trustProxy: boolean;
  requireSecureTransport: boolean;
}

const SIGNALING_PATH = /^\/ws(?:\/([^/]+))?\/?$/;

function refuse(status: UpgradeRefusal["status"], reason: string): UpgradeRefusal {
  return { ok: false, status, reason };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function resolveClientAddress(req: UpgradeRequest, trustProxy: boolean): string {
  if (trustProxy) {
    // Proxies append; only the rightmost hop was written by the trusted proxy.
    const forwarded = firstHeader(req.headers["x-forwarded-for"])?.split(",").at(-1)?.trim();
    if (forwarded) return forwarded;
  }
  return req.remoteAddress ?? "unknown";
}

function isSecure(req: UpgradeRequest, trustProxy: boolean): boolean {
  if (req.encrypted) return true;
  return trustProxy && firstHeader(req.headers["x-forwarded-proto"]) === "https";
}

function isOriginAllowed(origin: string | undefined, allowed: "*" | string[]): boolean {
  // Non-browser clients send no Origin; CORS-style checks only bind browsers.
  if (allowed === "*" || origin === undefined) return true;
  return allowed.includes(origin);
}

/**
 * Decide whether a WebSocket upgrade may proceed. Checks run cheapest and
 * least-trusting first: the source address is charged against the connection
 * bucket before the token is even looked at.
 */
export function createUpgradeGate(options: UpgradeGateOptions) {
  return (req: UpgradeRequest): UpgradeDecision => {
    let url: URL;
    try {
      url = new URL(req.url ?? "/", "http://localhost");
    } catch {
      return refuse(400, "bad_request");
    }
    const match = SIGNALING_PATH.exec(url.pathname);
    if (!match) {
      return refuse(404, "not_found");
    }

    if (!isOriginAllowed(firstHeader(req.headers.origin), options.allowedOrigins)) {
      return refuse(403, "origin_not_allowed");
    }

    if (options.requireSecureTransport && !isSecure(req, options.trustProxy)) {
      return refuse(403, "insecure_transport");
    }

    const address = resolveClientAddress(req, options.trustProxy);
    if (!options.limiter.admit(`addr:${address}`, "connection")) {
      return refuse(429, "rate_limited");
    }

    const auth = authenticateUpgrade(req, options.verify);
    if (!auth.ok) {
      return refuse(401, `token_${auth.error.code}`);
    }

    if (!options.limiter.admit(`id:${auth.identity.subject}`, "connection")) {
      return refuse(429, "rate_limited");
    }

    let room: string | null = null;
    if (match[1] !== undefined) {
      let decoded: string;
      try {
        decoded = decodeURIComponent(match[1]);
      } catch {
        return refuse(400, "invalid_room");
      }
      if (!RoomNameSchema.safeParse(decoded).success) {
        return refuse(400, "invalid_room");
      }
      room = decoded;
    }

    return { ok: true, identity: auth.identity, room, address };
  };
}

export type UpgradeGate = ReturnType<typeof createUpgradeGate>;
