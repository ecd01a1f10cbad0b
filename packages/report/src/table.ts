export interface Column<Row> {
  header: string;
  align?: "left" | "right";
  value: (row: Row) => string;
}

const EM = "=".repeat(10);

export function section(title: string): string {
  return `${EM} ${title} ${EM}`;
}

/**
 * Fixed-width text table: columns sized to their widest cell, separated by
 * two spaces, with a dashed rule under the header.
 */
export function renderTable<Row>(
  columns: readonly Column<Row>[],
  rows: readonly Row[]
): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((line) => line[i].length))
  );

  const format = (values: readonly string[]) =>
    values
      .map((value, i) =>
        columns[i].align === "right"
          ? value.padStart(widths[i])
          : value.padEnd(widths[i])
      )
      .join("  ")
      .trimEnd();

  const ruleWidth =
    widths.reduce((sum, width) => sum + width, 0) + 2 * (columns.length - 1);

  return [
    format(columns.map((column) => column.header)),
    "-".repeat(ruleWidth),
    ...cells.map(format),
  ];
}

export const fixed = (value: number, digits = 2): string => value.toFixed(digits);
