import { createLogger } from "@bitfit/shared";
import type { Analysis, IAnalysisConfig, SummaryStats } from "./analysis.domain";
import { assignCodes } from "./code-assigner";
import type { CodeTable } from "./code-table";
import { BudgetEncoder } from "./encoder";
import type { EntryResult, IEncoderConfig } from "./encoder.domain";
import { EmptyAlphabetError } from "./errors";
import { FrequencyTable } from "./frequency-table";
import { buildHuffmanTree, classifyAlphabet } from "./huffman-tree";
import { toSymbols } from "./symbols";

const logger = createLogger("huffman-analysis");

/**
 * Frequency count → tree → code table. The tree does not outlive this call.
 */
export function buildCodeTable(frequencies: FrequencyTable): CodeTable {
  return assignCodes(buildHuffmanTree(frequencies));
}

/**
 * Runs every stage once over the identifiers. An empty alphabet stops the
 * run before encoding; per-entry failures are kept in `entries` and never
 * stop the remaining entries.
 */
export function analyzeIdentifiers(
  identifiers: readonly string[],
  config: IAnalysisConfig = {}
): Analysis {
  const frequencies = FrequencyTable.count(identifiers.map(toSymbols));
  const condition = classifyAlphabet(frequencies);
  const encoder = (table: CodeTable) => new BudgetEncoder(table, config);

  if (condition === "empty") {
    const codeTable = buildCodeTable(frequencies);
    const encodingError = new EmptyAlphabetError();
    logger.error(
      { identifiers: identifiers.length },
      "Empty alphabet: no symbols to encode, skipping encoding"
    );
    return {
      condition,
      frequencies,
      codeTable,
      tree: null,
      targetBits: encoder(codeTable).targetBits,
      encodingError,
      entries: [],
      summary: summarize([]),
    };
  }

  if (condition === "degenerate") {
    logger.warn(
      { symbol: frequencies.symbols()[0] },
      "Degenerate alphabet: single symbol forced to a 1-bit code"
    );
  }

  const tree = buildHuffmanTree(frequencies);
  const shape = tree && {
    leafCount: tree.leafCount,
    branchCount: tree.branchCount,
    weight: tree.weight,
  };
  const codeTable = assignCodes(tree);
  logger.debug(
    { symbols: codeTable.size, maxLength: codeTable.maxLength, ...shape },
    "Code table built"
  );

  const budgetEncoder = encoder(codeTable);
  const entries = identifiers.map((identifier, index) =>
    budgetEncoder.encode(identifier, index)
  );
  const summary = summarize(entries);
  if (summary.over > 0 || summary.failed > 0) {
    logger.warn(
      { over: summary.over, failed: summary.failed, targetBits: budgetEncoder.targetBits },
      "Some entries do not fit the bit budget"
    );
  }

  return {
    condition,
    frequencies,
    codeTable,
    tree: shape,
    targetBits: budgetEncoder.targetBits,
    encodingError: null,
    entries,
    summary,
  };
}

/** Encodes run-time strings against an existing table. */
export function encodeIdentifiers(
  table: CodeTable,
  identifiers: readonly string[],
  config: IEncoderConfig = {}
): EntryResult[] {
  const encoder = new BudgetEncoder(table, config);
  return identifiers.map((identifier, index) => encoder.encode(identifier, index));
}

export function summarize(entries: readonly EntryResult[]): SummaryStats {
  let ok = 0;
  let over = 0;
  let failed = 0;
  let total = 0;
  let min = Infinity;
  let max = -Infinity;

  for (const entry of entries) {
    if (entry.status === "failed") {
      failed++;
      continue;
    }
    if (entry.classification === "OK") ok++;
    else over++;
    total += entry.bits;
    min = Math.min(min, entry.bits);
    max = Math.max(max, entry.bits);
  }

  const encoded = ok + over;
  if (encoded === 0) {
    return { entries: entries.length, ok, over, failed, bits: null, bytes: null };
  }

  return {
    entries: entries.length,
    ok,
    over,
    failed,
    bits: { min, max, total, average: total / encoded },
    bytes: {
      min: Math.ceil(min / 8),
      max: Math.ceil(max / 8),
      average: total / (8 * encoded),
    },
  };
}
