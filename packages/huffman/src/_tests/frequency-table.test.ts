import { describe, expect, test } from "vitest";
import { FrequencyTable, HuffmanError, toSymbols } from "../index";

describe("FrequencyTable", () => {
  test("counts every occurrence across entries", () => {
    const table = FrequencyTable.count(["ab", "ba", "aa"].map(toSymbols));

    expect(table.get(97)).toBe(4);
    expect(table.get(98)).toBe(2);
    expect(table.get(99)).toBe(0);
    expect(table.distinct).toBe(2);
    expect(table.total).toBe(6);
    expect(table.symbols()).toEqual([97, 98]);
  });

  test("an empty vocabulary has no symbols", () => {
    const table = FrequencyTable.count([]);
    expect(table.distinct).toBe(0);
    expect(table.total).toBe(0);
    expect(table.symbols()).toEqual([]);
  });

  test("builds from an explicit distribution", () => {
    const table = FrequencyTable.fromCounts({ 0: 3, 255: 1, 65: 0 });
    expect(table.symbols()).toEqual([0, 255]);
    expect(table.get(0)).toBe(3);
    expect(table.get(65)).toBe(0);
  });

  test("out-of-range lookups read as zero", () => {
    const table = FrequencyTable.fromCounts({ 65: 2 });
    expect(table.get(-1)).toBe(0);
    expect(table.get(256)).toBe(0);
  });

  test.each([
    [{ 256: 1 }],
    [{ 65: -1 }],
    [{ 65: 1.5 }],
  ])("rejects invalid distribution %j", (distribution) => {
    expect(() => FrequencyTable.fromCounts(distribution)).toThrow(HuffmanError);
  });
});
