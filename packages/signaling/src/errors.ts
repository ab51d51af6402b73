import type { AdmissionKind } from "./rate-limiter.js";

export type ProtocolErrorReason =
  | "unknown-message"
  | "invalid-message"
  | "payload-too-large"
  | "invalid-room";

export type PairingErrorReason = "room-full" | "no-peer" | "already-joined";

export type ErrorReason =
  | ProtocolErrorReason
  | PairingErrorReason
  | "rate-limited"
  | "internal-error";

/** Malformed, oversized or unknown frame. The session stays open. */
export class ProtocolError extends Error {
  constructor(
    readonly reason: ProtocolErrorReason,
    message: string
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** The room cannot take the request right now. The session stays open. */
export class PairingError extends Error {
  constructor(
    readonly reason: PairingErrorReason,
    message: string
  ) {
    super(message);
    this.name = "PairingError";
  }
}

export class AdmissionError extends Error {
  readonly reason = "rate-limited" as const;

  constructor(
    readonly kind: AdmissionKind,
    readonly key: string
  ) {
    super(`Rate limit exceeded for ${kind}`);
    this.name = "AdmissionError";
  }
}

/** Fatal to the affected session only. */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly closeCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export function isRecoverable(
  error: unknown
): error is ProtocolError | PairingError {
  return error instanceof ProtocolError || error instanceof PairingError;
}
