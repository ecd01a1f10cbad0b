import {
  analyzeIdentifiers,
  compareCaseFolding,
  encodeIdentifiers,
  summarize,
  type EntryResult,
  type SummaryStats,
} from "@bitfit/huffman";
import {
  analysisToJson,
  renderComparison,
  renderEncodings,
  renderReport,
  renderSummary,
} from "@bitfit/report";
import { createLogger } from "@bitfit/shared";
import type { Vocabulary } from "@bitfit/vocabulary";
import { resolveVocabulary } from "./file-utils";
import type { CliOptions, RunResult } from "./types";

const logger = createLogger("cli");

const json = (value: unknown) => JSON.stringify(value, null, 2) + "\n";

function exitCodeFor(summary: SummaryStats, options: CliOptions): number {
  return options.strict && (summary.over > 0 || summary.failed > 0) ? 1 : 0;
}

function runReport(vocabulary: Vocabulary, options: CliOptions): RunResult {
  const analysis = analyzeIdentifiers(vocabulary.identifiers, {
    targetBits: options.budget,
  });
  const output = options.json
    ? json(analysisToJson(analysis, vocabulary))
    : renderReport(analysis, vocabulary);

  const failedStage = options.strict && analysis.encodingError !== null;
  return {
    output,
    exitCode: failedStage ? 1 : exitCodeFor(analysis.summary, options),
  };
}

function runCompare(vocabulary: Vocabulary, options: CliOptions): RunResult {
  const comparison = compareCaseFolding(vocabulary.identifiers, {
    targetBits: options.budget,
  });
  return {
    output: options.json
      ? json(comparison)
      : renderComparison(comparison, vocabulary.descriptions) + "\n",
    exitCode: 0,
  };
}

function runEncode(vocabulary: Vocabulary, options: CliOptions): RunResult {
  const { codeTable } = analyzeIdentifiers(vocabulary.identifiers, {
    targetBits: options.budget,
  });
  const entries: EntryResult[] = encodeIdentifiers(codeTable, options.identifiers, {
    targetBits: options.budget,
  });
  const summary = summarize(entries);

  const output = options.json
    ? json(
        entries.map((entry) =>
          entry.status === "failed"
            ? { ...entry, error: entry.error.message }
            : entry
        )
      )
    : [renderEncodings(entries), renderSummary(summary, options.budget)].join("\n\n") + "\n";

  return { output, exitCode: exitCodeFor(summary, options) };
}

export async function runCommand(options: CliOptions): Promise<RunResult> {
  const vocabulary = await resolveVocabulary(options.vocab);
  logger.debug(
    { vocabulary: vocabulary.name, entries: vocabulary.identifiers.length, command: options.command },
    "Vocabulary loaded"
  );

  switch (options.command) {
    case "report":
      return runReport(vocabulary, options);
    case "compare":
      return runCompare(vocabulary, options);
    case "encode":
      return runEncode(vocabulary, options);
    case "help":
      throw new Error("help has no vocabulary to process");
  }
}
