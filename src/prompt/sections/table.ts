import type { TableRows } from "../../documents/types.js";
import { collapseCell } from "./shared.js";

function escapeCell(value: string): string {
  return collapseCell(value).replace(/\|/g, "\\|");
}

function renderRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/** Markdown pipe table; the first row is the header and short rows are padded. */
export function renderTableSection(rows: TableRows): string {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  if (width === 0) return "";

  const padded = rows.map((row) =>
    Array.from({ length: width }, (_, index) => escapeCell(row[index] ?? "")),
  );
  const [header, ...body] = padded;
  if (!header) return "";

  return [
    renderRow(header),
    renderRow(Array.from({ length: width }, () => "---")),
    ...body.map(renderRow),
  ].join("\n");
}
