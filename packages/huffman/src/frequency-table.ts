import { HuffmanError } from "./errors";
import { ALPHABET_SIZE, isSymbol, type Symbols } from "./symbols";

/**
 * Occurrence counts for all 256 byte values.
 */
export class FrequencyTable {
  private readonly _counts = new Float64Array(ALPHABET_SIZE);

  /** Counts every symbol of every entry, once per occurrence. */
  static count(entries: Iterable<Symbols>): FrequencyTable {
    const table = new FrequencyTable();
    for (const entry of entries) {
      for (let i = 0; i < entry.length; i++) {
        table.increment(entry[i]);
      }
    }
    return table;
  }

  /** Builds a table from an explicit symbol → count distribution. */
  static fromCounts(counts: Readonly<Record<number, number>>): FrequencyTable {
    const table = new FrequencyTable();
    for (const [key, count] of Object.entries(counts)) {
      table.increment(Number(key), count);
    }
    return table;
  }

  get(symbol: number): number {
    return isSymbol(symbol) ? this._counts[symbol] : 0;
  }

  increment(symbol: number, by = 1): void {
    if (!isSymbol(symbol)) {
      throw new HuffmanError(
        "INVALID_FREQUENCY",
        `Symbol must be an integer in [0, ${ALPHABET_SIZE - 1}], got ${symbol}`
      );
    }
    if (!Number.isSafeInteger(by) || by < 0) {
      throw new HuffmanError(
        "INVALID_FREQUENCY",
        `Count for symbol ${symbol} must be a non-negative integer, got ${by}`
      );
    }
    this._counts[symbol] += by;
  }

  /** Symbols with a nonzero count, ascending. */
  symbols(): number[] {
    const out: number[] = [];
    for (let s = 0; s < ALPHABET_SIZE; s++) {
      if (this._counts[s] > 0) out.push(s);
    }
    return out;
  }

  get distinct(): number {
    let n = 0;
    for (let s = 0; s < ALPHABET_SIZE; s++) if (this._counts[s] > 0) n++;
    return n;
  }

  get total(): number {
    let sum = 0;
    for (let s = 0; s < ALPHABET_SIZE; s++) sum += this._counts[s];
    return sum;
  }
}
