import { describe, expect, test } from "vitest";
import { z } from "zod";
import {
  buildDynamic,
  lazilyValidate,
  parseEnvironment,
  resolveLogLevel,
  type Environment,
  type LogLevel,
} from "../environment";

describe("parseEnvironment", () => {
  test("fills in defaults", () => {
    expect(parseEnvironment({})).toEqual({
      NODE_ENV: "production",
      BITFIT_TARGET_BITS: 32,
    });
  });

  test("coerces numeric variables", () => {
    const env = parseEnvironment({
      BITFIT_TARGET_BITS: "24",
      LOG_LEVEL: "debug",
      BITFIT_VOCABULARY: "vocab/*.json",
    });
    expect(env.BITFIT_TARGET_BITS).toBe(24);
    expect(env.LOG_LEVEL).toBe("debug");
    expect(env.BITFIT_VOCABULARY).toBe("vocab/*.json");
  });

  test("treats empty strings as unset", () => {
    expect(parseEnvironment({ BITFIT_TARGET_BITS: "" }).BITFIT_TARGET_BITS).toBe(32);
  });

  test.each(["abc", "0", "65", "2.5"])("rejects BITFIT_TARGET_BITS=%s", (value) => {
    expect(() => parseEnvironment({ BITFIT_TARGET_BITS: value })).toThrow(
      /^Missing or invalid environment variables: BITFIT_TARGET_BITS: /
    );
  });

  test("rejects an unknown log level", () => {
    expect(() => parseEnvironment({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});

describe("resolveLogLevel", () => {
  test.each<[Environment["NODE_ENV"], LogLevel]>([
    ["production", "info"],
    ["development", "debug"],
    ["test", "silent"],
  ])("NODE_ENV=%s logs at %s by default", (nodeEnv, level) => {
    expect(resolveLogLevel(parseEnvironment({ NODE_ENV: nodeEnv }))).toBe(level);
  });

  test("LOG_LEVEL overrides NODE_ENV", () => {
    expect(
      resolveLogLevel(parseEnvironment({ NODE_ENV: "development", LOG_LEVEL: "warn" })),
    ).toBe("warn");
  });
});

describe("buildDynamic", () => {
  const schema = z.object({
    FLAG: z.boolean().default(false),
    LIST: z.array(z.string()).optional(),
    COUNT: z.number(),
    NAME: z.string().optional(),
  });

  test("coerces by field type", () => {
    expect(
      buildDynamic(schema, { FLAG: "TRUE", LIST: "a, b", COUNT: "3", NAME: "x", OTHER: "y" })
    ).toEqual({ FLAG: true, LIST: ["a", "b"], COUNT: 3, NAME: "x" });
  });

  test("parses JSON arrays", () => {
    expect(buildDynamic(schema, { LIST: '["x","y z"]' }).LIST).toEqual(["x", "y z"]);
  });
});

describe("lazilyValidate", () => {
  test("reads the source once", () => {
    let reads = 0;
    const schema = z.object({ COUNT: z.number().default(1) });
    const validate = lazilyValidate(schema, () => {
      reads++;
      return {};
    });

    expect(reads).toBe(0);
    expect(validate()).toEqual({ COUNT: 1 });
    expect(validate()).toBe(validate());
    expect(reads).toBe(1);
  });
});
