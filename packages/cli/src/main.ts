import { setLogLevel, variables } from "@bitfit/shared";
import { VocabularyError } from "@bitfit/vocabulary";
import { UsageError, parseCliArgs, usage } from "./args";
import { runCommand } from "./processor";
import type { CliOptions } from "./types";

export interface Io {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: Io = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * @returns The process exit code: 0 success, 1 strict-mode failure or
 *   vocabulary or runtime error, 2 usage error
 */
export async function main(argv: readonly string[], io: Io = processIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv, variables());
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${error.message}\n${usage()}`);
    return 2;
  }

  if (options.command === "help") {
    io.stdout(usage());
    return 0;
  }
  if (options.verbose) setLogLevel("debug");

  try {
    const { output, exitCode } = await runCommand(options);
    io.stdout(output);
    return exitCode;
  } catch (error) {
    if (!(error instanceof VocabularyError)) throw error;
    io.stderr(`${error.message}\n`);
    return 1;
  }
}
