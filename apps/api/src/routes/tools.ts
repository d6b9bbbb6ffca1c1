import { Router } from "express";
import { z } from "zod";
import { halfLifeFromK, kFromHalfLife } from "../services/landgem/decay.js";

export const tools = Router();

tools.get("/half-life", (req, res) => {
  const p = z.object({ k: z.coerce.number().positive() }).safeParse(req.query);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  return res.json({ k: p.data.k, halfLifeYears: halfLifeFromK(p.data.k) });
});

tools.get("/k", (req, res) => {
  const p = z.object({ halfLife: z.coerce.number().positive() }).safeParse(req.query);
  if (!p.success) return res.status(400).json({ error: "bad-params", details: p.error.flatten() });
  return res.json({ halfLifeYears: p.data.halfLife, k: kFromHalfLife(p.data.halfLife) });
});
