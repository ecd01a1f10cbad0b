import type { HuffmanError } from "./errors";
import type { Symbols } from "./symbols";

export const DEFAULT_TARGET_BITS = 32;

export type Classification = "OK" | "OVER";

export interface IEncoderConfig {
  /** Maximum bits an entry may take and still be classified OK */
  targetBits?: number;
}

export interface EncodedEntry {
  bits: number;
  bytes: number;
  classification: Classification;
}

export type EntryResult =
  | ({
      status: "encoded";
      index: number;
      identifier: string;
      bitString: string;
    } & EncodedEntry)
  | {
      status: "failed";
      index: number;
      identifier: string;
      error: HuffmanError;
    };

export interface IBudgetEncoder {
  readonly targetBits: number;

  /**
   * Sums the code lengths of every symbol in the entry and classifies the
   * total against the budget.
   * @throws EmptyAlphabetError when the table has no codes
   * @throws UnknownSymbolError when a symbol has no code
   */
  measure(symbols: Symbols): EncodedEntry;

  /**
   * Concatenation of every symbol's code, most significant bit first.
   * @throws the same errors as `measure`
   */
  bitString(symbols: Symbols): string;

  /** Encodes one identifier, capturing failures in the result */
  encode(identifier: string, index?: number): EntryResult;
}
