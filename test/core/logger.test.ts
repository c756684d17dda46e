import { describe, expect, it, vi } from "vitest";
import { logger, resolveLogger } from "../../src/core/logger";

describe("resolveLogger", () => {
  it("prefers an injected logger", () => {
    const injected = { warn: vi.fn() };
    expect(resolveLogger(injected)).toBe(injected);
  });

  it("falls back to the shared pino logger", () => {
    expect(resolveLogger()).toBe(logger);
    expect(logger.level).toBe(process.env.LOG_LEVEL ?? "warn");
  });
});
