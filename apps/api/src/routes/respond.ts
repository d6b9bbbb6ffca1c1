import type { Response } from "express";
import { z } from "zod";
import { tableToCsv, tableToWorkbook, type Table } from "../services/exportService.js";

export const FormatQuerySchema = z.object({
  format: z.enum(["json", "csv", "xlsx"]).default("json"),
  metadata: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

export type FormatQuery = z.infer<typeof FormatQuerySchema>;

// Writes a table as CSV text or an xlsx attachment
export async function sendTable(res: Response, table: Table, q: FormatQuery, baseName: string): Promise<void> {
  if (q.format === "csv") {
    res.type("text/csv").send(tableToCsv(table, { includeMetadata: q.metadata }));
    return;
  }
  const buf = await tableToWorkbook(table, "Emissions", { includeMetadata: q.metadata });
  res.set({
    "Content-Type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    "Content-Disposition": `attachment; filename="${baseName}.xlsx"`,
    "Content-Length": buf.length.toString(),
  });
  res.send(buf);
}
