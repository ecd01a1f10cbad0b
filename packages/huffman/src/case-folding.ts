import { analyzeIdentifiers } from "./analysis";
import type { IAnalysisConfig, SummaryStats } from "./analysis.domain";
import type { EntryResult } from "./encoder.domain";

export interface CaseFoldingRow {
  index: number;
  mixed: string;
  mixedBits: number | null;
  lower: string;
  lowerBits: number | null;
}

export interface CaseFoldingSide {
  distinctSymbols: number;
  summary: SummaryStats;
}

export interface CaseFoldingComparison {
  rows: CaseFoldingRow[];
  mixed: CaseFoldingSide;
  lower: CaseFoldingSide;
}

const bitsOf = (entry: EntryResult | undefined): number | null =>
  entry?.status === "encoded" ? entry.bits : null;

/**
 * Builds one code over the identifiers as given and another over their
 * lowercased copies, and lines the two encodings up entry by entry.
 */
export function compareCaseFolding(
  identifiers: readonly string[],
  config: IAnalysisConfig = {}
): CaseFoldingComparison {
  const lowered = identifiers.map((identifier) => identifier.toLowerCase());
  const mixed = analyzeIdentifiers(identifiers, config);
  const lower = analyzeIdentifiers(lowered, config);

  const rows = identifiers.map((identifier, index) => ({
    index,
    mixed: identifier,
    mixedBits: bitsOf(mixed.entries[index]),
    lower: lowered[index],
    lowerBits: bitsOf(lower.entries[index]),
  }));

  return {
    rows,
    mixed: { distinctSymbols: mixed.codeTable.size, summary: mixed.summary },
    lower: { distinctSymbols: lower.codeTable.size, summary: lower.summary },
  };
}
