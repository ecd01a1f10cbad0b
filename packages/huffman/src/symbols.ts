const encoder = new TextEncoder();

export const ALPHABET_SIZE = 256;

export type Symbols = ArrayLike<number>;

/** UTF-8 bytes of an identifier; printable ASCII maps one char to one symbol. */
export function toSymbols(identifier: string): Uint8Array {
  return encoder.encode(identifier);
}

export function isSymbol(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < ALPHABET_SIZE;
}
