export type HuffmanErrorCode =
  | "EMPTY_ALPHABET"
  | "UNKNOWN_SYMBOL"
  | "INVALID_FREQUENCY"
  | "INVALID_BUDGET"
  | "QUEUE_OVERFLOW"
  | "CODE_TOO_LONG"
  | "TREE_RELEASED";

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(code: HuffmanErrorCode, message: string) {
    super(message);
    this.name = "HuffmanError";
    this.code = code;
  }
}

/**
 * The code table has no entries, so nothing can be encoded against it.
 */
export class EmptyAlphabetError extends HuffmanError {
  constructor() {
    super("EMPTY_ALPHABET", "Cannot encode: the alphabet has no symbols");
    this.name = "EmptyAlphabetError";
  }
}

export class UnknownSymbolError extends HuffmanError {
  readonly symbol: number;
  readonly position: number;

  constructor(symbol: number, position: number) {
    super(
      "UNKNOWN_SYMBOL",
      `Symbol ${describeSymbol(symbol)} at position ${position} has no code`
    );
    this.name = "UnknownSymbolError";
    this.symbol = symbol;
    this.position = position;
  }
}

export function isHuffmanError(error: unknown): error is HuffmanError {
  return error instanceof HuffmanError;
}

/** `'c'` for printable ASCII, `0xNN` otherwise. */
export function describeSymbol(symbol: number): string {
  if (symbol >= 0x20 && symbol < 0x7f) {
    return `'${String.fromCharCode(symbol)}'`;
  }
  return `0x${symbol.toString(16).toUpperCase().padStart(2, "0")}`;
}
