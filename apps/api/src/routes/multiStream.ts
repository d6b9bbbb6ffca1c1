import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { MultiStreamModel } from "../services/landgem/multiStream.js";
import { validateWasteData } from "../services/landgem/validation.js";
import { multiStreamSeriesToTable } from "../services/exportService.js";
import { parseMultiStreamCsv, parseMultiStreamWorkbook } from "../services/importService.js";
import { WasteHistorySchema, type WasteHistory } from "../types.js";
import type { SoftWarning } from "../util/warnings.js";
import { CalcOptionsSchema, YearSchema, importBodyParsers, projectionYearsSchema } from "./params.js";
import { FormatQuerySchema, sendTable } from "./respond.js";

const ModelBody = z.object({
  k: z.number().finite(),
  methaneContent: z.number().finite().default(0.5),
  nmocConcentration: z.number().nonnegative().optional(),
  streams: z.array(z.object({ name: z.string().min(1), L0: z.number().finite() })).min(1),
  waste: z.record(WasteHistorySchema),
});

// ?streams[msw]=msw_mg&streams[organic]=organic_mg
const ImportQuery = z.object({
  streams: z.record(z.string().min(1)).refine((m) => Object.keys(m).length > 0, "at least one stream column"),
  sheet: z.string().min(1).optional(),
});

type ModelInput = z.infer<typeof ModelBody>;

function buildModel(input: ModelInput): { model: MultiStreamModel; warnings: SoftWarning[] } {
  const model = new MultiStreamModel(input.k, {
    methaneContent: input.methaneContent,
    nmocConcentration: input.nmocConcentration,
  });
  const warnings: SoftWarning[] = [];
  input.streams.forEach((s, i) => {
    const w = model.addStream(s.name, s.L0);
    // composition warnings repeat for every stream; keep the first
    if (i === 0) warnings.push(...w);
  });
  return { model, warnings };
}

function checkWaste(waste: Record<string, WasteHistory>): SoftWarning[] {
  return Object.values(waste).flatMap((w) => validateWasteData(w));
}

export const multiStream = Router();

multiStream.post("/", (req, res) => {
  const p = ModelBody.merge(CalcOptionsSchema).extend({ year: YearSchema }).safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, year, collectionEfficiency, includeNmoc } = p.data;

  const { model, warnings } = buildModel(p.data);
  warnings.push(...checkWaste(waste));
  const result = model.calculateMultiStream(waste, year, { collectionEfficiency, includeNmoc });
  return res.json({ year, streams: model.streamNames(), result, warnings });
});

multiStream.post("/series", async (req, res, next) => {
  const q = FormatQuerySchema.safeParse(req.query);
  if (!q.success) return res.status(400).json({ error: "bad-params", details: q.error.flatten() });
  const body = ModelBody.extend({
    projectionYears: projectionYearsSchema(),
    collectionEfficiency: z.number().default(0),
  });
  const p = body.safeParse(req.body);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  const { waste, projectionYears, collectionEfficiency } = p.data;

  try {
    const { model, warnings } = buildModel(p.data);
    warnings.push(...checkWaste(waste));
    const series = model.calculateTimeSeriesMultiStream(waste, projectionYears, collectionEfficiency);
    const table = multiStreamSeriesToTable(series);

    if (q.data.format !== "json") return await sendTable(res, table, q.data, "landfill-gas-multi-stream");
    return res.json({ ...table, warnings });
  } catch (err) {
    return next(err);
  }
});

// Shared year column plus one amount column per stream, from CSV or a workbook
multiStream.post("/import", importBodyParsers, (req: Request, res: Response) => {
  const q = ImportQuery.safeParse(req.query);
  if (!q.success) return res.status(400).json({ error: "bad-params", details: q.error.flatten() });
  const { streams, sheet } = q.data;

  const body: unknown = req.body;
  let waste: Record<string, WasteHistory>;
  if (Buffer.isBuffer(body)) waste = parseMultiStreamWorkbook(body, streams, { sheet });
  else if (typeof body === "string") waste = parseMultiStreamCsv(body, streams);
  else return res.status(415).json({ error: "expected-csv-or-workbook" });

  return res.json({ streams: Object.keys(waste), waste, warnings: checkWaste(waste) });
});
