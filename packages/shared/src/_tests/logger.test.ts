import { afterEach, describe, expect, test } from "vitest";
import { createLogger, setLogLevel } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("silent");
  });

  test("takes its level from the environment", () => {
    const logger = createLogger("test");
    expect(logger.level).toBe("silent");
  });

  test("setLogLevel reaches existing and later loggers", () => {
    const before = createLogger("before");
    setLogLevel("debug");
    const after = createLogger("after");

    expect(before.level).toBe("debug");
    expect(after.level).toBe("debug");
  });
});
