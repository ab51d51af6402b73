// Token issuing and verification for signaling connections
export { issueToken, createTokenVerifier } from "./jwt.js"
export type { IssueTokenOptions } from "./jwt.js"
export { extractBearerToken, authenticateUpgrade } from "./middleware.js"
export type { UpgradeRequestLike } from "./middleware.js"
export { AuthError } from "./types.js"
export type {
  AuthErrorCode,
  Identity,
  TokenPayload,
  TokenVerifier,
  VerifyResult,
} from "./types.js"
