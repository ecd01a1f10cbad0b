import { codeToString, type ICodeTable } from "../../index";

/**
 * Reads a concatenation of code words back into symbols. Only the tests
 * need decoding; it proves the encoder's output is unambiguous.
 */
export function decodeBitString(table: ICodeTable, bitString: string): number[] {
  const bySymbol = new Map<string, number>();
  for (const [symbol, code] of table.entries()) {
    bySymbol.set(codeToString(code), symbol);
  }

  const out: number[] = [];
  let pending = "";
  for (const bit of bitString) {
    if (bit !== "0" && bit !== "1") throw new Error(`Not a bit: ${bit}`);
    pending += bit;
    const symbol = bySymbol.get(pending);
    if (symbol !== undefined) {
      out.push(symbol);
      pending = "";
    } else if (pending.length > table.maxLength) {
      throw new Error(`No code matches ${pending}`);
    }
  }
  if (pending !== "") throw new Error(`Trailing bits: ${pending}`);
  return out;
}
