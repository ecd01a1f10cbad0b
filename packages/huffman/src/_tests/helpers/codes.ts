import { codeToString, type ICodeTable } from "../../index";

/** char → code string, for readable assertions. */
export function codeStrings(table: ICodeTable): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [symbol, code] of table.entries()) {
    out[String.fromCharCode(symbol)] = codeToString(code);
  }
  return out;
}

export function counts(record: Record<string, number>): Record<number, number> {
  const out: Record<number, number> = {};
  for (const [char, count] of Object.entries(record)) {
    out[char.charCodeAt(0)] = count;
  }
  return out;
}

/** Deterministic 32-bit PRNG so generated distributions are stable. */
export function mulberry32(seed: number) {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
