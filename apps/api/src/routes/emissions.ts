import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { compositionAtYear, peakYear } from "../services/landgem/composition.js";
import { wasteInPlace } from "../services/landgem/decay.js";
import { LandfillGasModel } from "../services/landgem/singleStream.js";
import { validateWasteData } from "../services/landgem/validation.js";
import { parseWasteCsv, parseWasteWorkbook } from "../services/importService.js";
import { seriesToTable } from "../services/exportService.js";
import { WasteHistorySchema, type WasteHistory } from "../types.js";
import {
  CalcOptionsSchema,
  ModelSourceSchema,
  YearSchema,
  importBodyParsers,
  projectionYearsSchema,
  resolveModelParameters,
} from "./params.js";
import { FormatQuerySchema, sendTable } from "./respond.js";

const SingleYearBody = ModelSourceSchema.merge(CalcOptionsSchema).extend({
  waste: WasteHistorySchema,
  year: YearSchema,
});

function seriesBody() {
  return ModelSourceSchema.merge(CalcOptionsSchema).extend({
    waste: WasteHistorySchema,
    projectionYears: projectionYearsSchema(),
  });
}

const WasteInPlaceBody = z.object({
  waste: WasteHistorySchema,
  year: YearSchema,
  decayFraction: z.number().default(0),
});

const ImportQuery = z.object({
  yearColumn: z.string().min(1).default("year"),
  amountColumn: z.string().min(1).default("waste_mg"),
  sheet: z.string().min(1).optional(),
});

export const emissions = Router();

// Single calculation year
emissions.post("/", (req, res) => {
  const p = SingleYearBody.safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, year, collectionEfficiency, includeNmoc } = p.data;

  const params = resolveModelParameters(p.data);
  const wasteWarnings = validateWasteData(waste);
  const model = new LandfillGasModel(params);
  const result = model.calculateEmissions(waste, year, { collectionEfficiency, includeNmoc });

  return res.json({ year, params, result, warnings: [...model.warnings, ...wasteWarnings] });
});

// Projection series; ?format=csv|xlsx for a table download
emissions.post("/series", async (req, res, next) => {
  const q = FormatQuerySchema.safeParse(req.query);
  if (!q.success) return res.status(400).json({ error: "bad-params", details: q.error.flatten() });
  const p = seriesBody().safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, projectionYears, collectionEfficiency, includeNmoc } = p.data;

  try {
    const params = resolveModelParameters(p.data);
    const wasteWarnings = validateWasteData(waste);
    const model = new LandfillGasModel(params);
    const series = model.calculateTimeSeries(waste, projectionYears, { collectionEfficiency, includeNmoc });

    if (q.data.format !== "json") return await sendTable(res, seriesToTable(series), q.data, "landfill-gas-series");

    const peak = peakYear(series);
    return res.json({
      params,
      columns: series.columns,
      rows: series.rows,
      peak: peak ? { year: peak.year, ch4_generation_rate: peak.ch4_generation_rate } : null,
      warnings: [...model.warnings, ...wasteWarnings],
    });
  } catch (err) {
    return next(err);
  }
});

emissions.post("/composition", (req, res) => {
  const p = seriesBody().extend({ year: YearSchema }).safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, projectionYears, year } = p.data;

  const model = new LandfillGasModel(resolveModelParameters(p.data));
  validateWasteData(waste);
  const series = model.calculateTimeSeries(waste, projectionYears);
  return res.json(compositionAtYear(series, year));
});

emissions.post("/waste-in-place", (req, res) => {
  const p = WasteInPlaceBody.safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, year, decayFraction } = p.data;
  validateWasteData(waste);
  return res.json({ year, decayFraction, waste_in_place_mg: wasteInPlace(waste, year, decayFraction) });
});

// Upload: a text/csv body or an .xlsx/.xls workbook, with a year column and an amount column
emissions.post("/import", importBodyParsers, (req: Request, res: Response) => {
  const q = ImportQuery.safeParse(req.query);
  if (!q.success) return res.status(400).json({ error: "bad-params", details: q.error.flatten() });

  const body: unknown = req.body;
  let waste: WasteHistory;
  if (Buffer.isBuffer(body)) waste = parseWasteWorkbook(body, q.data);
  else if (typeof body === "string") waste = parseWasteCsv(body, q.data);
  else return res.status(415).json({ error: "expected-csv-or-workbook" });

  const warnings = validateWasteData(waste);
  const total = waste.amounts.reduce((s, a) => s + a, 0);
  return res.json({ waste, total_waste_mg: total, warnings });
});
