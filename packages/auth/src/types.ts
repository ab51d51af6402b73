export type AuthErrorCode = "missing" | "invalid" | "expired"

export class AuthError extends Error {
  constructor(
    readonly code: AuthErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "AuthError"
  }
}

export interface TokenPayload {
  sub: string // identity claim
  iat?: number
  exp: number
}

/**
 * Who is on the other end of a connection. Used for rate-limit bucketing and
 * log context only; being authenticated is the whole authorization model.
 */
export interface Identity {
  subject: string
  expiresAt: number // epoch seconds
}

export type VerifyResult =
  | { ok: true; identity: Identity }
  | { ok: false; error: AuthError }

export type TokenVerifier = (token: string | null | undefined) => VerifyResult
