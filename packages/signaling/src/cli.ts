import { Command, InvalidArgumentError } from "commander";
import { issueToken } from "@pairline/auth";
import { loadSignalingConfig } from "./config.js";
import { createChildLogger, createRootLogger } from "./logger.js";
import { createSignalingServer } from "./server.js";
import { VERSION } from "./version.js";

const FORCE_EXIT_MS = 10_000;

export interface CliIO {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
}

const defaultIO: CliIO = {
  env: process.env,
  stdout: (text) => {
    process.stdout.write(text);
  },
};

/** "3600" is seconds, anything else is a duration string like "24h". */
export function parseExpiresIn(value: string): string | number {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError("Expiry must not be empty.");
  }
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (!/^\d+(?:\.\d+)?\s*[a-zA-Z]+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Invalid expiry: ${value}`);
  }
  return trimmed;
}

async function serve(io: CliIO): Promise<void> {
  const config = loadSignalingConfig(io.env);
  createRootLogger(config.log);
  const logger = createChildLogger("cli");
  const server = createSignalingServer(config, logger);
  await server.start();

  const handleShutdown = async (signal: string) => {
    logger.info({ signal }, "shutdown_requested");

    const forceExit = setTimeout(() => {
      logger.error("Forcing shutdown - server didn't close in time");
      process.exit(1);
    }, FORCE_EXIT_MS);

    try {
      await server.stop();
      clearTimeout(forceExit);
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExit);
      logger.error({ err: error }, "shutdown_failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
  process.on("SIGINT", () => void handleShutdown("SIGINT"));
}

export function createCli(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("pairline")
    .description("Pairline - WebRTC signaling relay for two-party rooms")
    .version(VERSION, "-v, --version", "output the version number");

  program
    .command("serve", { isDefault: true })
    .description("Start the signaling server (configured through PAIRLINE_* variables)")
    .action(() => serve(io));

  program
    .command("issue-token")
    .description("Mint a signed access token for a subject")
    .argument("<subject>", "identity the token is issued to")
    .option("-e, --expires-in <duration>", "lifetime, e.g. 3600 or 24h", parseExpiresIn, "24h")
    .action((subject: string, options: { expiresIn: string | number }) => {
      const secret = io.env.PAIRLINE_JWT_SECRET;
      if (!secret) {
        program.error("PAIRLINE_JWT_SECRET is not set");
        return;
      }
      io.stdout(`${issueToken(secret, subject, { expiresIn: options.expiresIn })}\n`);
    });

  return program;
}
