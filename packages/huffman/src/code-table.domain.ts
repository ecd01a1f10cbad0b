/**
 * A prefix code word: `length` bits of `bits`, most significant bit first.
 */
export interface Code {
  readonly bits: bigint;
  readonly length: number;
}

export interface ICodeTable {
  /** Number of symbols with a code */
  readonly size: number;

  /** Longest code length in the table, 0 when empty */
  readonly maxLength: number;

  /**
   * @returns The code for `symbol`, or undefined when the symbol has none
   */
  get(symbol: number): Code | undefined;

  has(symbol: number): boolean;

  /** Symbols that carry a code, ascending */
  symbols(): number[];

  entries(): Generator<[number, Code], void, unknown>;
}
