import type { TableRows } from "../types.js";

/** A positioned piece of page text in PDF user space (y grows upwards). */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LayoutCell {
  x: number;
  text: string;
}

export interface LayoutLine {
  y: number;
  height: number;
  cells: LayoutCell[];
}

export interface PageLayout {
  body: string;
  tables: TableRows[];
}

const DEFAULT_FONT_SIZE = 10;
const LINE_TOLERANCE_RATIO = 0.5;
const WORD_GAP_RATIO = 0.15;
const MIN_CELL_GAP = 12;
const CELL_GAP_RATIO = 1.5;
const COLUMN_ALIGN_RATIO = 2;
const MIN_TABLE_ROWS = 2;
const MIN_TABLE_COLUMNS = 2;

function fontSize(height: number): number {
  return height > 0 ? height : DEFAULT_FONT_SIZE;
}

function splitCells(runs: TextRun[], size: number): LayoutCell[] {
  const cellGap = Math.max(MIN_CELL_GAP, CELL_GAP_RATIO * size);
  const cells: LayoutCell[] = [];
  let current: LayoutCell | undefined;
  let previousEnd = Number.NEGATIVE_INFINITY;

  for (const run of runs) {
    const gap = run.x - previousEnd;
    if (!current || gap > cellGap) {
      current = { x: run.x, text: run.text };
      cells.push(current);
    } else {
      current.text += gap > WORD_GAP_RATIO * size ? ` ${run.text}` : run.text;
    }
    previousEnd = Math.max(previousEnd, run.x + run.width);
  }

  return cells
    .map((cell) => ({ x: cell.x, text: cell.text.replace(/\s+/g, " ").trim() }))
    .filter((cell) => cell.text.length > 0);
}

/** Groups runs into lines, top to bottom, and each line into gap-separated cells. */
export function groupLines(runs: TextRun[]): LayoutLine[] {
  const visible = runs
    .filter((run) => run.text.trim().length > 0)
    .sort((a, b) => (b.y !== a.y ? b.y - a.y : a.x - b.x));

  const grouped: Array<{ y: number; height: number; runs: TextRun[] }> = [];
  for (const run of visible) {
    const last = grouped[grouped.length - 1];
    const tolerance = Math.max(1, LINE_TOLERANCE_RATIO * Math.max(fontSize(run.height), last?.height ?? 0));
    if (last && Math.abs(last.y - run.y) <= tolerance) {
      last.runs.push(run);
      last.height = Math.max(last.height, fontSize(run.height));
    } else {
      grouped.push({ y: run.y, height: fontSize(run.height), runs: [run] });
    }
  }

  return grouped
    .map((line) => ({
      y: line.y,
      height: line.height,
      cells: splitCells([...line.runs].sort((a, b) => a.x - b.x), line.height),
    }))
    .filter((line) => line.cells.length > 0);
}

function columnsAlign(row: LayoutLine, reference: LayoutLine): boolean {
  if (row.cells.length !== reference.cells.length) return false;
  const tolerance = COLUMN_ALIGN_RATIO * Math.max(row.height, reference.height);
  return row.cells.every((cell, index) => {
    const anchor = reference.cells[index];
    return anchor !== undefined && Math.abs(cell.x - anchor.x) <= tolerance;
  });
}

/**
 * Consecutive lines that split into the same number of aligned cells (at
 * least two columns, two rows) are read as a table. Anything else stays
 * plain text.
 */
export function detectTables(lines: LayoutLine[]): TableRows[] {
  const tables: TableRows[] = [];
  let run: LayoutLine[] = [];

  const flush = (): void => {
    if (run.length >= MIN_TABLE_ROWS) {
      tables.push(run.map((line) => line.cells.map((cell) => cell.text)));
    }
    run = [];
  };

  for (const line of lines) {
    if (line.cells.length < MIN_TABLE_COLUMNS) {
      flush();
      continue;
    }
    const reference = run[0];
    if (reference && !columnsAlign(line, reference)) {
      flush();
    }
    run.push(line);
  }
  flush();

  return tables;
}

export function layoutPage(runs: TextRun[]): PageLayout {
  const lines = groupLines(runs);
  return {
    body: lines.map((line) => line.cells.map((cell) => cell.text).join(" ")).join("\n"),
    tables: detectTables(lines),
  };
}
