import "dotenv/config";
import { createCli } from "./cli.js";

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Failed to start:", error);
    process.exit(1);
  });
