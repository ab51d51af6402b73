import { describe, expect, test } from "vitest";
import { createChildLogger, createRootLogger, getRootLogger } from "./logger.js";

describe("logger", () => {
  test("child loggers hang off the configured root", () => {
    const root = createRootLogger({ level: "warn", format: "json" });

    expect(getRootLogger()).toBe(root);
    expect(root.level).toBe("warn");
    expect(createChildLogger("cli").bindings()).toEqual({ name: "cli" });
  });
});
