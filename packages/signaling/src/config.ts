import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

const BooleanFlagSchema = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((value) => value === "true" || value === "1"),
]);

const PositiveIntSchema = z.coerce.number().int().positive();

function bucketSchema(defaults: { capacity: number; refillPerSecond: number }) {
  return z
    .object({
      capacity: PositiveIntSchema.default(defaults.capacity),
      refillPerSecond: z.coerce.number().nonnegative().default(defaults.refillPerSecond),
    })
    .default({});
}

const AllowedOriginsSchema = z.union([z.literal("*"), z.array(z.string().url())]);

export const SignalingConfigSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    jwtSecret: z.string().min(16, "jwtSecret must be at least 16 characters"),
    rateLimit: z
      .object({
        connection: bucketSchema({ capacity: 10, refillPerSecond: 0.5 }),
        message: bucketSchema({ capacity: 60, refillPerSecond: 20 }),
      })
      .default({}),
    idleTimeoutMs: PositiveIntSchema.default(60_000),
    heartbeatIntervalMs: PositiveIntSchema.default(20_000),
    maxPayloadBytes: PositiveIntSchema.default(16 * 1024),
    maxBufferedBytes: PositiveIntSchema.default(1024 * 1024),
    allowedOrigins: AllowedOriginsSchema.default("*"),
    trustProxy: BooleanFlagSchema.default(false),
    environment: z.enum(["development", "production", "test"]).default("development"),
    requireSecureTransport: BooleanFlagSchema.optional(),
    log: z
      .object({
        level: LogLevelSchema.default("info"),
        format: LogFormatSchema.default("pretty"),
      })
      .default({}),
  })
  .transform((config) => ({
    ...config,
    requireSecureTransport: config.requireSecureTransport ?? config.environment === "production",
  }));

export type SignalingConfigInput = z.input<typeof SignalingConfigSchema>;
export type SignalingConfig = z.output<typeof SignalingConfigSchema>;

function parseOrigins(raw: string | undefined): string | string[] | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed === "*") return "*";
  return trimmed
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Build the server config from environment variables. Unset variables fall
 * back to schema defaults; malformed ones throw a ZodError at startup.
 */
export function loadSignalingConfig(env: NodeJS.ProcessEnv = process.env): SignalingConfig {
  return SignalingConfigSchema.parse({
    host: env.PAIRLINE_HOST,
    port: env.PAIRLINE_PORT ?? env.PORT,
    jwtSecret: env.PAIRLINE_JWT_SECRET,
    rateLimit: {
      connection: {
        capacity: env.PAIRLINE_CONNECT_CAPACITY,
        refillPerSecond: env.PAIRLINE_CONNECT_REFILL_PER_SEC,
      },
      message: {
        capacity: env.PAIRLINE_MESSAGE_CAPACITY,
        refillPerSecond: env.PAIRLINE_MESSAGE_REFILL_PER_SEC,
      },
    },
    idleTimeoutMs: env.PAIRLINE_IDLE_TIMEOUT_MS,
    heartbeatIntervalMs: env.PAIRLINE_HEARTBEAT_INTERVAL_MS,
    maxPayloadBytes: env.PAIRLINE_MAX_PAYLOAD_BYTES,
    maxBufferedBytes: env.PAIRLINE_MAX_BUFFERED_BYTES,
    allowedOrigins: parseOrigins(env.PAIRLINE_ALLOWED_ORIGINS),
    trustProxy: env.PAIRLINE_TRUST_PROXY,
    environment: env.NODE_ENV,
    requireSecureTransport: env.PAIRLINE_REQUIRE_TLS,
    log: {
      level: env.PAIRLINE_LOG,
      format: env.PAIRLINE_LOG_FORMAT,
    },
  });
}
