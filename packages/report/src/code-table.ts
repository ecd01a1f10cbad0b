import { codeToString, describeSymbol, type Code, type ICodeTable } from "@bitfit/huffman";
import { renderTable, section, type Column } from "./table";

type CodeRow = [symbol: number, code: Code];

const columns: Column<CodeRow>[] = [
  { header: "Char", value: ([symbol]) => describeSymbol(symbol) },
  { header: "Code", value: ([, code]) => codeToString(code) },
  { header: "Len", align: "right", value: ([, code]) => String(code.length) },
];

/** One row per symbol that carries a code, ascending by symbol. */
export function renderCodeTable(table: ICodeTable): string {
  return [
    section("CHARACTER CODES"),
    ...renderTable(columns, [...table.entries()]),
  ].join("\n");
}
