import { codeToString, type Analysis } from "@bitfit/huffman";
import { vocabularyEntries, type Vocabulary } from "@bitfit/vocabulary";

export interface AnalysisJson {
  vocabulary: string;
  condition: Analysis["condition"];
  targetBits: number;
  error: string | null;
  codes: { symbol: number; char: string; code: string; length: number }[];
  entries: {
    index: number;
    identifier: string;
    description: string | null;
    status: "OK" | "OVER" | "FAIL";
    bitString: string | null;
    bits: number | null;
    bytes: number | null;
    error: string | null;
  }[];
  summary: Analysis["summary"];
}

/** Plain-JSON view of an analysis; codes become `0`/`1` strings. */
export function analysisToJson(analysis: Analysis, vocabulary: Vocabulary): AnalysisJson {
  const descriptions = vocabularyEntries(vocabulary);
  return {
    vocabulary: vocabulary.name,
    condition: analysis.condition,
    targetBits: analysis.targetBits,
    error: analysis.encodingError?.message ?? null,
    codes: [...analysis.codeTable.entries()].map(([symbol, code]) => ({
      symbol,
      char: String.fromCharCode(symbol),
      code: codeToString(code),
      length: code.length,
    })),
    entries: analysis.entries.map((entry): AnalysisJson["entries"][number] => {
      const description = descriptions[entry.index]?.description ?? null;
      if (entry.status === "failed") {
        return {
          index: entry.index,
          identifier: entry.identifier,
          description,
          status: "FAIL",
          bitString: null,
          bits: null,
          bytes: null,
          error: entry.error.message,
        };
      }
      return {
        index: entry.index,
        identifier: entry.identifier,
        description,
        status: entry.classification,
        bitString: entry.bitString,
        bits: entry.bits,
        bytes: entry.bytes,
        error: null,
      };
    }),
    summary: analysis.summary,
  };
}
