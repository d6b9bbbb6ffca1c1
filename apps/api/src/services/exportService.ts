import ExcelJS from "exceljs";
import type { EmissionsSeries, MultiStreamSeries } from "../types.js";

export type TableRecord = Record<string, number>;

export type Table = {
  columns: string[];
  records: TableRecord[];
};

export type ExportOptions = {
  includeMetadata?: boolean;
  generatedAt?: Date;
};

const HEADER_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF1F4E3D" } };
const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" } };

export function seriesToTable(series: EmissionsSeries): Table {
  const columns = [...series.columns];
  const records = series.rows.map((row) => {
    const rec: TableRecord = {};
    for (const col of series.columns) rec[col] = row[col] ?? 0;
    return rec;
  });
  return { columns, records };
}

export function streamColumn(name: string): string {
  return `${name}_ch4_generation_rate`;
}

export function multiStreamSeriesToTable(series: MultiStreamSeries): Table {
  const columns = [
    "year",
    "ch4_generation_rate",
    "total_gas_rate",
    "co2_rate",
    ...series.streamNames.map(streamColumn),
    "cumulative_ch4",
  ];
  const records = series.rows.map((row) => {
    const rec: TableRecord = {
      year: row.year,
      ch4_generation_rate: row.ch4_generation_rate,
      total_gas_rate: row.total_gas_rate,
      co2_rate: row.co2_rate,
    };
    for (const name of series.streamNames) rec[streamColumn(name)] = row.streams[name] ?? 0;
    rec.cumulative_ch4 = row.cumulative_ch4;
    return rec;
  });
  return { columns, records };
}

export function tableToCsv(table: Table, opts: ExportOptions = {}): string {
  const lines: string[] = [];
  if (opts.includeMetadata) {
    const generatedAt = (opts.generatedAt ?? new Date()).toISOString();
    lines.push("# Landfill Gas Emissions Data", `# Generated: ${generatedAt}`, "#");
  }
  lines.push(table.columns.join(","));
  for (const rec of table.records) {
    lines.push(table.columns.map((c) => String(rec[c] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

// Emissions sheet plus an optional Metadata sheet
export async function tableToWorkbook(
  table: Table,
  sheetName = "Emissions",
  opts: ExportOptions = {},
): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet(sheetName);

  ws.addRow(table.columns);
  ws.getRow(1).eachCell((cell) => {
    cell.fill = HEADER_FILL;
    cell.font = HEADER_FONT;
  });
  for (const rec of table.records) ws.addRow(table.columns.map((c) => rec[c] ?? null));
  table.columns.forEach((c, i) => {
    ws.getColumn(i + 1).width = Math.max(12, c.length + 2);
  });

  if (opts.includeMetadata) {
    const meta = wb.addWorksheet("Metadata");
    meta.addRow(["Parameter", "Value"]);
    meta.addRow(["Generated", (opts.generatedAt ?? new Date()).toISOString()]);
    meta.addRow(["Rows", table.records.length]);
    meta.addRow(["Columns", table.columns.length]);
  }

  const buf = await wb.xlsx.writeBuffer();
  return Buffer.from(buf);
}
