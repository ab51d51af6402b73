import type { IncomingHttpHeaders } from "node:http"
import type { TokenVerifier, VerifyResult } from "./types.js"

export interface UpgradeRequestLike {
  url?: string
  headers: IncomingHttpHeaders
}

function tokenFromQuery(target: string): string | null {
  try {
    return new URL(target, "http://localhost").searchParams.get("token")
  } catch {
    return null
  }
}

/**
 * Pull a bearer token out of a WebSocket upgrade request.
 * Browsers cannot set headers on `new WebSocket()`, so the `token` query
 * parameter is checked first; the Authorization header serves other clients.
 */
export function extractBearerToken(req: UpgradeRequestLike): string | null {
  const fromQuery = tokenFromQuery(req.url ?? "/")
  if (fromQuery) {
    return fromQuery
  }

  const authHeader = req.headers.authorization
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7)
  }
  return null
}

/**
 * Authenticate a WebSocket upgrade request.
 */
export function authenticateUpgrade(
  req: UpgradeRequestLike,
  verify: TokenVerifier,
): VerifyResult {
  return verify(extractBearerToken(req))
}
