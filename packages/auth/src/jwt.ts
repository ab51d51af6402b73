import jwt from "jsonwebtoken"
import { z } from "zod"
import { AuthError } from "./types.js"
import type {
  Identity,
  TokenPayload,
  TokenVerifier,
  VerifyResult,
} from "./types.js"

const DEFAULT_JWT_EXPIRY = "24h"
const JWT_ALGORITHM = "HS256"

const TokenPayloadSchema: z.ZodType<TokenPayload> = z.object({
  sub: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number(),
})

export interface IssueTokenOptions {
  expiresIn?: string | number
}

export function issueToken(
  secret: string,
  subject: string,
  options: IssueTokenOptions = {},
): string {
  return jwt.sign({ sub: subject }, secret, {
    algorithm: JWT_ALGORITHM,
    expiresIn: options.expiresIn ?? DEFAULT_JWT_EXPIRY,
  } as jwt.SignOptions)
}

function fail(error: AuthError): VerifyResult {
  return { ok: false, error }
}

/**
 * Create a standalone token verifier bound to one shared secret.
 *
 * Only HS256 is accepted, so a token re-signed with `alg: none` or an
 * asymmetric algorithm is rejected as invalid. Signature comparison happens
 * inside jsonwebtoken and is constant-time.
 */
export function createTokenVerifier(
  secret: string,
  options: { now?: () => number } = {},
): TokenVerifier {
  return (token) => {
    const trimmed = token?.trim()
    if (!trimmed) {
      return fail(new AuthError("missing", "Missing token"))
    }

    let decoded: string | jwt.JwtPayload
    try {
      decoded = jwt.verify(trimmed, secret, {
        algorithms: [JWT_ALGORITHM],
        clockTimestamp: options.now
          ? Math.floor(options.now() / 1000)
          : undefined,
      })
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return fail(new AuthError("expired", "Token expired"))
      }
      return fail(new AuthError("invalid", "Invalid token"))
    }

    const payload = TokenPayloadSchema.safeParse(decoded)
    if (!payload.success) {
      return fail(new AuthError("invalid", "Invalid token payload"))
    }

    const identity: Identity = {
      subject: payload.data.sub,
      expiresAt: payload.data.exp,
    }
    return { ok: true, identity }
  }
}
