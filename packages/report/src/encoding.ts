import type { EntryResult, SummaryStats } from "@bitfit/huffman";
import { fixed, renderTable, section, type Column } from "./table";

const columns: Column<EntryResult>[] = [
  { header: "Idx", value: (entry) => String(entry.index) },
  { header: "Command", value: (entry) => entry.identifier },
  {
    header: "Bit string",
    value: (entry) => (entry.status === "encoded" ? entry.bitString : "-"),
  },
  {
    header: "Bits",
    align: "right",
    value: (entry) => (entry.status === "encoded" ? String(entry.bits) : "-"),
  },
  {
    header: "Bytes",
    align: "right",
    value: (entry) => (entry.status === "encoded" ? String(entry.bytes) : "-"),
  },
  {
    header: "OK/OVER",
    value: (entry) =>
      entry.status === "encoded"
        ? entry.classification
        : `FAIL (${entry.error.message})`,
  },
];

export function renderEncodings(entries: readonly EntryResult[]): string {
  return [section("ENCODED COMMANDS"), ...renderTable(columns, entries)].join(
    "\n"
  );
}

export function renderSummary(summary: SummaryStats, targetBits: number): string {
  const lines = [
    section(`TARGET ${targetBits} BITS / ${Math.ceil(targetBits / 8)} BYTES`),
  ];
  const { bits, bytes } = summary;
  if (bits === null || bytes === null) {
    lines.push("No entries were encoded.");
  } else {
    lines.push(
      `Per command:  min ${bits.min} bits (${bytes.min} byte(s)), max ${bits.max} bits (${bytes.max} byte(s))`,
      `Average:      ${fixed(bits.average)} bits, ${fixed(bytes.average)} bytes`
    );
  }
  lines.push(
    `Entries:      ${summary.ok} OK, ${summary.over} OVER, ${summary.failed} failed`
  );
  return lines.join("\n");
}
