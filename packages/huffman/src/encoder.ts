import type { ICodeTable, Code } from "./code-table.domain";
import { codeToString } from "./code-table";
import {
  DEFAULT_TARGET_BITS,
  type EncodedEntry,
  type EntryResult,
  type IBudgetEncoder,
  type IEncoderConfig,
} from "./encoder.domain";
import {
  EmptyAlphabetError,
  HuffmanError,
  UnknownSymbolError,
  isHuffmanError,
} from "./errors";
import { toSymbols, type Symbols } from "./symbols";

export class BudgetEncoder implements IBudgetEncoder {
  readonly targetBits: number;
  private readonly _table: ICodeTable;

  constructor(table: ICodeTable, { targetBits = DEFAULT_TARGET_BITS }: IEncoderConfig = {}) {
    if (!Number.isInteger(targetBits) || targetBits < 1) {
      throw new HuffmanError(
        "INVALID_BUDGET",
        `Target bit budget must be a positive integer, got ${targetBits}`
      );
    }
    this._table = table;
    this.targetBits = targetBits;
  }

  measure(symbols: Symbols): EncodedEntry {
    let bits = 0;
    for (const code of this.codesFor(symbols)) bits += code.length;
    return {
      bits,
      bytes: Math.ceil(bits / 8),
      classification: bits <= this.targetBits ? "OK" : "OVER",
    };
  }

  bitString(symbols: Symbols): string {
    return this.codesFor(symbols).map(codeToString).join("");
  }

  encode(identifier: string, index = 0): EntryResult {
    const symbols = toSymbols(identifier);
    try {
      return {
        status: "encoded",
        index,
        identifier,
        bitString: this.bitString(symbols),
        ...this.measure(symbols),
      };
    } catch (error) {
      if (!isHuffmanError(error)) throw error;
      return { status: "failed", index, identifier, error };
    }
  }

  private codesFor(symbols: Symbols): Code[] {
    if (this._table.size === 0) throw new EmptyAlphabetError();

    const codes: Code[] = [];
    for (let i = 0; i < symbols.length; i++) {
      const code = this._table.get(symbols[i]);
      if (code === undefined) throw new UnknownSymbolError(symbols[i], i);
      codes.push(code);
    }
    return codes;
  }
}
