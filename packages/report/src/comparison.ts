import type {
  CaseFoldingComparison,
  CaseFoldingRow,
  CaseFoldingSide,
} from "@bitfit/huffman";
import { fixed, renderTable, section, type Column } from "./table";

const bits = (value: number | null) => (value === null ? "-" : String(value));

function columns(descriptions: readonly string[]): Column<CaseFoldingRow>[] {
  return [
    { header: "Full name", value: (row) => descriptions[row.index] ?? "" },
    { header: "Mixed case", value: (row) => row.mixed },
    { header: "Bits", align: "right", value: (row) => bits(row.mixedBits) },
    { header: "Lower case", value: (row) => row.lower },
    { header: "Bits", align: "right", value: (row) => bits(row.lowerBits) },
  ];
}

function sideLine(label: string, side: CaseFoldingSide): string {
  const stats = side.summary.bits;
  const range =
    stats === null
      ? "no entries encoded"
      : `min ${stats.min}, max ${stats.max}, total ${stats.total}, average ${fixed(stats.average)} bits`;
  return `${label.padEnd(12)}${side.distinctSymbols} distinct chars; ${range}`;
}

export function renderComparison(
  comparison: CaseFoldingComparison,
  descriptions: readonly string[] = []
): string {
  return [
    section("CASE FOLDING"),
    ...renderTable(columns(descriptions), comparison.rows),
    "",
    sideLine("Mixed case:", comparison.mixed),
    sideLine("Lower case:", comparison.lower),
  ].join("\n");
}
