import { bundledVocabulary } from "@bitfit/vocabulary";
import { describe, expect, test } from "vitest";
import { analyzeIdentifiers, toSymbols } from "../index";
import { mulberry32 } from "./helpers/codes";
import { decodeBitString } from "./helpers/decode";

describe("encoded entries decode back to their identifiers", () => {
  test("bundled command vocabulary", () => {
    const { identifiers } = bundledVocabulary();
    const analysis = analyzeIdentifiers(identifiers);

    for (const entry of analysis.entries) {
      if (entry.status !== "encoded") throw entry.error;
      const decoded = decodeBitString(analysis.codeTable, entry.bitString);
      expect(decoded).toEqual([...toSymbols(entry.identifier)]);
    }
  });

  test("random printable identifiers", () => {
    const random = mulberry32(42);
    const identifiers = Array.from({ length: 30 }, () =>
      Array.from({ length: 1 + Math.floor(random() * 12) }, () =>
        String.fromCharCode(0x20 + Math.floor(random() * 95))
      ).join("")
    );
    const analysis = analyzeIdentifiers(identifiers, { targetBits: 64 });

    for (const entry of analysis.entries) {
      if (entry.status !== "encoded") throw entry.error;
      const decoded = String.fromCharCode(
        ...decodeBitString(analysis.codeTable, entry.bitString)
      );
      expect(decoded).toBe(entry.identifier);
    }
  });
});
