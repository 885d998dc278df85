import type { Segment } from "../../documents/types.js";
import { renderTableSection } from "./table.js";

export function isEmptySegment(segment: Segment): boolean {
  return (
    !segment.heading?.trim() &&
    segment.body.trim().length === 0 &&
    !segment.notes?.trim() &&
    segment.tables.every((table) => table.every((row) => row.every((cell) => cell.trim().length === 0)))
  );
}

/** `[n] heading`, then body, tables and speaker notes; absent parts are left out. */
export function renderSegmentSection(segment: Segment): string {
  const heading = segment.heading?.trim();
  const lines = [heading ? `[${segment.index}] ${heading}` : `[${segment.index}]`];

  const body = segment.body.trimEnd();
  if (body.trim()) lines.push(body);

  const tables = segment.tables.map(renderTableSection).filter((table) => table.length > 0);
  if (tables.length > 0) lines.push(tables.join("\n\n"));

  const notes = segment.notes?.trim();
  if (notes) lines.push(`Notes: ${notes}`);

  return lines.join("\n");
}
