import { DEFAULT_TARGET_BITS } from "@bitfit/huffman";

export type Command = "report" | "compare" | "encode" | "help";

export const COMMANDS: readonly Command[] = ["report", "compare", "encode", "help"];

export interface CliOptions {
  command: Command;
  /** Strings given to `encode` */
  identifiers: string[];
  /** Glob of vocabulary files; the bundled vocabulary when null */
  vocab: string | null;
  budget: number;
  json: boolean;
  strict: boolean;
  verbose: boolean;
}

export const DEFAULT_OPTIONS: CliOptions = {
  command: "report",
  identifiers: [],
  vocab: null,
  budget: DEFAULT_TARGET_BITS,
  json: false,
  strict: false,
  verbose: false,
};

export interface RunResult {
  output: string;
  exitCode: number;
}
