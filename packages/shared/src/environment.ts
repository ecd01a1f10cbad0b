import { z } from "zod";

type ZodSchemaShape = z.ZodRawShape;

export type EnvironmentSource = Record<string, string | undefined>;

/**
 * Pulls every key named by the schema out of `source`, coercing the raw
 * strings to whatever the field expects so zod can validate them.
 */
export function buildDynamic<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  source: EnvironmentSource = process.env,
) {
  const envVarsToParse: Record<string, unknown> = {};
  for (const key of Object.keys(schema.shape)) {
    envVarsToParse[key] = coerceValue(key, source[key], schema);
  }
  return envVarsToParse;
}

function coerceValue<T extends ZodSchemaShape>(
  key: string,
  value: string | undefined,
  schema: z.ZodObject<T>,
) {
  if (value === undefined || value === "") return undefined;

  let fieldSchema: z.ZodTypeAny = schema.shape[key];

  // Unwrap ZodDefault and ZodOptional to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional
  ) {
    fieldSchema = fieldSchema._def.innerType;
  }

  if (fieldSchema instanceof z.ZodNumber) {
    return Number(value);
  } else if (fieldSchema instanceof z.ZodBoolean) {
    return value.toLowerCase() === "true";
  } else if (fieldSchema instanceof z.ZodArray) {
    try {
      return JSON.parse(value);
    } catch {
      return value.split(",").map((item) => item.trim());
    }
  }

  return value;
}

/**
 * Validates on first call and hands back the same parsed object afterwards.
 */
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: () => Record<string, unknown>,
): () => z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  return function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap());

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Missing or invalid environment variables: ${issues}`);
    }

    _variables = parsed.data;
    return _variables;
  };
}

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  BITFIT_TARGET_BITS: z.number().int().positive().max(64).default(32),
  BITFIT_VOCABULARY: z.string().optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

/** `LOG_LEVEL` when set, otherwise chosen by `NODE_ENV`. */
export function resolveLogLevel(
  env: Pick<Environment, "NODE_ENV" | "LOG_LEVEL">,
): LogLevel {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  switch (env.NODE_ENV) {
    case "development":
      return "debug";
    case "test":
      return "silent";
    case "production":
      return "info";
  }
}

export function parseEnvironment(source: EnvironmentSource): Environment {
  return lazilyValidate(environmentSchema, () =>
    buildDynamic(environmentSchema, source),
  )();
}

export const variables = lazilyValidate(environmentSchema, () =>
  buildDynamic(environmentSchema),
);
