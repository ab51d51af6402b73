export { VERSION } from "./version.js";
export * from "./types.js";
export * from "./errors.js";
export { RateLimiter } from "./rate-limiter.js";
export type { AdmissionKind, BucketConfig, RateLimiterConfig } from "./rate-limiter.js";
export {
  ClientMessageSchema,
  RoomNameSchema,
  encodeServerFrame,
  isRelayMessage,
  parseClientFrame,
} from "./protocol.js";
export type { ClientMessage, RelayMessage, ServerFrame } from "./protocol.js";
export { RoomRegistry, ROOM_CAPACITY } from "./room-registry.js";
export type { JoinResult, LeaveResult, RelayResult, RoomSnapshot } from "./room-registry.js";
export { MessageRouter } from "./router.js";
export type { RouteOutcome, RouterStats, RoutableSession } from "./router.js";
export { SignalingSession } from "./session.js";
export type { SessionLimits, SignalingSessionOptions } from "./session.js";
export { createUpgradeGate, resolveClientAddress } from "./upgrade-gate.js";
export type { UpgradeDecision, UpgradeGate, UpgradeRequest } from "./upgrade-gate.js";
export { loadSignalingConfig, SignalingConfigSchema } from "./config.js";
export type { SignalingConfig, SignalingConfigInput } from "./config.js";
export { createRootLogger } from "./logger.js";
export { createSignalingServer } from "./server.js";
export type { SignalingServer, SignalingServerDeps } from "./server.js";
