export interface TableColumn<Row> {
  header: string;
  cell: (row: Row) => string;
  align?: "left" | "right";
}

const COLUMN_SEPARATOR = "  ";
const ANSI_PATTERN = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, "g");

function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, "").length;
}

function pad(value: string, width: number, align: "left" | "right"): string {
  const padding = " ".repeat(Math.max(0, width - visibleLength(value)));
  return align === "right" ? padding + value : value + padding;
}

/**
 * Lays out a header line plus one line per row. Every column is padded to
 * its widest visible cell, so color codes do not shift the alignment.
 */
export function renderTable<Row>(
  columns: readonly TableColumn<Row>[],
  rows: readonly Row[],
): string[] {
  const lines = [
    columns.map((column) => column.header),
    ...rows.map((row) => columns.map((column) => column.cell(row))),
  ];
  const widths = columns.map((_, index) =>
    Math.max(...lines.map((cells) => visibleLength(cells[index] ?? ""))),
  );

  return lines.map((cells) =>
    cells
      .map((value, index) =>
        pad(value, widths[index] ?? 0, columns[index]?.align ?? "left"),
      )
      .join(COLUMN_SEPARATOR),
  );
}
