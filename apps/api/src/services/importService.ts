import * as XLSX from "xlsx";
import type { WasteHistory } from "../types.js";
import { InputShapeError } from "../util/errors.js";

export type WasteImportOptions = {
  yearColumn?: string;
  amountColumn?: string;
};

export type WorkbookImportOptions = {
  // first sheet when omitted
  sheet?: string;
};

type Cell = string | number;
type SheetTable = { header: string[]; rows: Cell[][] };

// 12,345.6 style thousands separators
const GROUPED_NUMBER = /^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/;

function toCell(v: unknown): Cell {
  if (typeof v === "number") return v;
  if (v === null || v === undefined) return "";
  return String(v).trim();
}

function isSkippable(row: Cell[]): boolean {
  const first = row[0];
  return row.every((c) => c === "") || (typeof first === "string" && first.startsWith("#"));
}

function sheetTable(wb: XLSX.WorkBook, sheetName: string | undefined, label: string): SheetTable {
  const name = sheetName ?? wb.SheetNames[0];
  const sheet = name === undefined ? undefined : wb.Sheets[name];
  if (!sheet) {
    throw new InputShapeError(`Sheet '${sheetName ?? ""}' not found`, { sheets: wb.SheetNames });
  }
  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: "", blankrows: false });
  const rows = grid.map((r) => r.map(toCell)).filter((r) => !isSkippable(r));
  if (rows.length === 0) throw new InputShapeError(`${label} has no header row`);
  const [head, ...body] = rows;
  return { header: head.map((c) => String(c)), rows: body };
}

function readCsv(text: string): SheetTable {
  // comment lines are dropped before parsing so they never reach format detection
  const body = text
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "" && !l.trimStart().startsWith("#"))
    .join("\n");
  if (body === "") throw new InputShapeError("CSV has no header row");
  return sheetTable(XLSX.read(body, { type: "string", raw: true }), undefined, "CSV");
}

function readWorkbook(data: Buffer, opts: WorkbookImportOptions): SheetTable {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(data, { type: "buffer" });
  } catch (err) {
    throw new InputShapeError("Could not read workbook", { reason: err instanceof Error ? err.message : String(err) });
  }
  return sheetTable(wb, opts.sheet, "Sheet");
}

function columnIndex(table: SheetTable, column: string): number {
  const idx = table.header.indexOf(column);
  if (idx < 0) throw new InputShapeError(`Column '${column}' not found`, { column, header: table.header });
  return idx;
}

function numberAt(row: Cell[], idx: number, line: number, column: string): number {
  const cell = row[idx] ?? "";
  let n: number;
  if (typeof cell === "number") n = cell;
  else if (cell === "") n = NaN;
  else n = Number(GROUPED_NUMBER.test(cell) ? cell.replace(/,/g, "") : cell);
  if (!Number.isFinite(n)) {
    throw new InputShapeError(`Row ${line}: '${column}' is not a number (${cell === "" ? "empty" : cell})`, {
      line,
      column,
    });
  }
  return n;
}

function yearsOf(table: SheetTable, idx: number, column: string): number[] {
  return table.rows.map((row, i) => {
    const y = numberAt(row, idx, i + 1, column);
    if (!Number.isInteger(y)) throw new InputShapeError(`Row ${i + 1}: '${column}' must be a whole year (${y})`);
    return y;
  });
}

function wasteFrom(table: SheetTable, opts: WasteImportOptions): WasteHistory {
  const yearColumn = opts.yearColumn ?? "year";
  const amountColumn = opts.amountColumn ?? "waste_mg";
  const yi = columnIndex(table, yearColumn);
  const ai = columnIndex(table, amountColumn);

  return {
    years: yearsOf(table, yi, yearColumn),
    amounts: table.rows.map((row, i) => numberAt(row, ai, i + 1, amountColumn)),
  };
}

function streamsFrom(table: SheetTable, streamColumns: Record<string, string>): Record<string, WasteHistory> {
  const years = yearsOf(table, columnIndex(table, "year"), "year");

  const out: Record<string, WasteHistory> = {};
  for (const [stream, column] of Object.entries(streamColumns)) {
    const idx = columnIndex(table, column);
    out[stream] = {
      years: [...years],
      amounts: table.rows.map((row, i) => numberAt(row, idx, i + 1, column)),
    };
  }
  return out;
}

export function parseWasteCsv(text: string, opts: WasteImportOptions = {}): WasteHistory {
  return wasteFrom(readCsv(text), opts);
}

// .xlsx or legacy .xls
export function parseWasteWorkbook(data: Buffer, opts: WasteImportOptions & WorkbookImportOptions = {}): WasteHistory {
  return wasteFrom(readWorkbook(data, opts), opts);
}

/**
 * One shared `year` column and one amount column per stream, e.g.
 * `{ msw: "msw_mg", organic: "organic_mg" }`.
 */
export function parseMultiStreamCsv(text: string, streamColumns: Record<string, string>): Record<string, WasteHistory> {
  return streamsFrom(readCsv(text), streamColumns);
}

export function parseMultiStreamWorkbook(
  data: Buffer,
  streamColumns: Record<string, string>,
  opts: WorkbookImportOptions = {},
): Record<string, WasteHistory> {
  return streamsFrom(readWorkbook(data, opts), streamColumns);
}
