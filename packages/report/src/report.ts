import type { Analysis } from "@bitfit/huffman";
import type { Vocabulary } from "@bitfit/vocabulary";
import { renderCodeTable } from "./code-table";
import { renderDescriptions } from "./descriptions";
import { renderEncodings, renderSummary } from "./encoding";

export function renderAlphabet(analysis: Analysis): string {
  switch (analysis.condition) {
    case "empty":
      return `Alphabet: empty, nothing to encode (${analysis.encodingError?.message ?? "no symbols"})`;
    case "degenerate":
      return "Alphabet: 1 symbol, forced to a 1-bit code";
    case "normal":
      return `Alphabet: ${analysis.codeTable.size} symbols, longest code ${analysis.codeTable.maxLength} bits`;
  }
}

/** Every report section, separated by blank lines. */
export function renderReport(analysis: Analysis, vocabulary: Vocabulary): string {
  const sections = [renderAlphabet(analysis)];
  if (analysis.codeTable.size > 0) sections.push(renderCodeTable(analysis.codeTable));
  sections.push(renderDescriptions(vocabulary));
  if (analysis.encodingError === null) {
    sections.push(
      renderEncodings(analysis.entries),
      renderSummary(analysis.summary, analysis.targetBits)
    );
  }
  return sections.join("\n\n") + "\n";
}
