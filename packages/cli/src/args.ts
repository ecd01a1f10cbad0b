import { parseArgs } from "node:util";
import type { Environment } from "@bitfit/shared";
import { COMMANDS, DEFAULT_OPTIONS, type CliOptions, type Command } from "./types";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function usage(): string {
  return `
bitfit - check that command identifiers fit a bit budget under a Huffman code

Usage:
  bitfit [command] [options]

Commands:
  report                Build the code and print every table (default)
  compare               Compare the mixed-case and lowercased vocabularies
  encode <string...>    Encode the given strings with the vocabulary's code
  help                  Show this help

Options:
  --vocab <glob>        Vocabulary JSON file(s) (default: bundled commands)
  --budget <bits>       Target bit budget per entry (default: 32)
  --json                Print JSON instead of tables
  --strict              Exit with code 1 when any entry is OVER or fails
  --verbose             Enable debug logging
  --help                Show this help

Environment Variables:
  BITFIT_TARGET_BITS    Default for --budget
  BITFIT_VOCABULARY     Default for --vocab
  LOG_LEVEL             pino log level (default: by NODE_ENV)
  NODE_ENV              production (info), development (debug), test (silent)

Examples:
  bitfit
  bitfit compare
  bitfit encode lcKp rgTk --budget 24
  bitfit report --vocab "vocabularies/*.json" --strict
`;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseBudget(raw: string): number {
  const budget = Number(raw);
  if (!Number.isInteger(budget) || budget < 1 || budget > 64) {
    throw new UsageError(
      `--budget must be an integer between 1 and 64, got "${raw}"`
    );
  }
  return budget;
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      vocab: { type: "string" },
      budget: { type: "string" },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });
}

/**
 * Flags win over environment variables, which win over built-in defaults.
 * @throws UsageError on unknown options, commands or bad values
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Pick<Environment, "BITFIT_TARGET_BITS" | "BITFIT_VOCABULARY">
): CliOptions {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const [first, ...rest] = positionals;

  if (values.help) return { ...DEFAULT_OPTIONS, command: "help" };

  const command = first ?? DEFAULT_OPTIONS.command;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  if (command !== "encode" && rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }
  if (command === "encode" && rest.length === 0) {
    throw new UsageError("encode needs at least one string to encode");
  }

  return {
    command,
    identifiers: rest,
    vocab: values.vocab ?? env.BITFIT_VOCABULARY ?? DEFAULT_OPTIONS.vocab,
    budget:
      values.budget !== undefined
        ? parseBudget(values.budget)
        : env.BITFIT_TARGET_BITS,
    json: values.json ?? false,
    strict: values.strict ?? false,
    verbose: values.verbose ?? false,
  };
}
