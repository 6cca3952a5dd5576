/**
 * Fixed-width text tables for CLI output.
 */

export type TableColumn = {
  key: string;
  header: string;
  align?: "left" | "right";
  minWidth?: number;
};

export type RenderTableOpts = {
  columns: TableColumn[];
  rows: Array<Record<string, string>>;
  /** Left margin. Default: two spaces */
  indent?: string;
};

export function renderTable({ columns, rows, indent = "  " }: RenderTableOpts): string {
  const widths = columns.map((col) =>
    Math.max(col.header.length, col.minWidth ?? 0, ...rows.map((r) => (r[col.key] ?? "").length)),
  );

  const formatRow = (cells: string[]) =>
    indent +
    cells
      .map((cell, i) =>
        columns[i].align === "right" ? cell.padStart(widths[i]) : cell.padEnd(widths[i]),
      )
      .join("  ")
      .trimEnd();

  const lines = [
    formatRow(columns.map((c) => c.header)),
    indent + widths.map((w) => "-".repeat(w)).join("  "),
    ...rows.map((row) => formatRow(columns.map((c) => row[c.key] ?? ""))),
  ];
  return lines.join("\n");
}
