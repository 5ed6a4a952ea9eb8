import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, resolveLogLevel } from "../src";
import { recordingLogger } from "./helpers/fakes";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it.each([
    [undefined, "info"],
    ["", "info"],
    ["debug", "debug"],
    [" warn ", "warn"],
    ["verbose", "info"],
    ["warning", "info"]
  ])("resolves LOG_LEVEL=%o to %s", (value, expected) => {
    expect(resolveLogLevel(value)).toBe(expected);
  });

  it("loads with a LOG_LEVEL pino does not know", async () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    vi.resetModules();

    const fresh = await import("../src/logger");

    expect(fresh.logger.level).toBe("info");
  });

  it("takes its level from LOG_LEVEL", async () => {
    vi.stubEnv("LOG_LEVEL", "error");
    vi.resetModules();

    const fresh = await import("../src/logger");

    expect(fresh.logger.level).toBe("error");
  });

  it("binds the component on child loggers", () => {
    const { logger, lines } = recordingLogger("info");

    createLogger("store", { shard: 2 }, logger).info("ready");

    expect(lines()[0]).toMatchObject({ component: "store", shard: 2, msg: "ready" });
  });
});
