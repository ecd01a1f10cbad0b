import type { Code, ICodeTable } from "./code-table.domain";
import { HuffmanError } from "./errors";
import { ALPHABET_SIZE, isSymbol } from "./symbols";

export const MAX_CODE_LENGTH = 64;

/**
 * Symbol → code mapping over the full byte alphabet. A length of 0 marks a
 * symbol that cannot be encoded.
 */
export class CodeTable implements ICodeTable {
  private readonly _lengths = new Uint8Array(ALPHABET_SIZE);
  private readonly _patterns = new BigUint64Array(ALPHABET_SIZE);
  private _size = 0;
  private _maxLength = 0;

  get size(): number {
    return this._size;
  }

  get maxLength(): number {
    return this._maxLength;
  }

  set(symbol: number, code: Code): void {
    if (!isSymbol(symbol)) {
      throw new RangeError(`Symbol out of range: ${symbol}`);
    }
    if (code.length < 1 || code.length > MAX_CODE_LENGTH) {
      throw new HuffmanError(
        "CODE_TOO_LONG",
        `Code length for symbol ${symbol} must be within [1, ${MAX_CODE_LENGTH}], got ${code.length}`
      );
    }
    if (this._lengths[symbol] === 0) this._size++;
    this._lengths[symbol] = code.length;
    this._patterns[symbol] = code.bits;
    if (code.length > this._maxLength) this._maxLength = code.length;
  }

  get(symbol: number): Code | undefined {
    if (!this.has(symbol)) return undefined;
    return { bits: this._patterns[symbol], length: this._lengths[symbol] };
  }

  has(symbol: number): boolean {
    return isSymbol(symbol) && this._lengths[symbol] > 0;
  }

  symbols(): number[] {
    const out: number[] = [];
    for (let s = 0; s < ALPHABET_SIZE; s++) {
      if (this._lengths[s] > 0) out.push(s);
    }
    return out;
  }

  *entries(): Generator<[number, Code], void, unknown> {
    for (let s = 0; s < ALPHABET_SIZE; s++) {
      if (this._lengths[s] > 0) {
        yield [s, { bits: this._patterns[s], length: this._lengths[s] }];
      }
    }
  }
}

/** The code's bits as a `0`/`1` string, most significant bit first. */
export function codeToString({ bits, length }: Code): string {
  return length === 0 ? "" : bits.toString(2).padStart(length, "0");
}
