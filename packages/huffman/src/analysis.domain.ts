import type { CodeTable } from "./code-table";
import type { EntryResult, IEncoderConfig } from "./encoder.domain";
import type { EmptyAlphabetError } from "./errors";
import type { FrequencyTable } from "./frequency-table";
import type { AlphabetCondition } from "./huffman-tree.domain";

export interface IAnalysisConfig extends IEncoderConfig {}

export interface BitStats {
  min: number;
  max: number;
  total: number;
  average: number;
}

export interface ByteStats {
  min: number;
  max: number;
  average: number;
}

export interface SummaryStats {
  entries: number;
  ok: number;
  over: number;
  failed: number;
  /** null when no entry was encoded */
  bits: BitStats | null;
  bytes: ByteStats | null;
}

export interface TreeShape {
  leafCount: number;
  branchCount: number;
  weight: number;
}

export interface Analysis {
  condition: AlphabetCondition;
  frequencies: FrequencyTable;
  codeTable: CodeTable;
  tree: TreeShape | null;
  targetBits: number;
  /** Set when the encoding stage did not run */
  encodingError: EmptyAlphabetError | null;
  entries: EntryResult[];
  summary: SummaryStats;
}
