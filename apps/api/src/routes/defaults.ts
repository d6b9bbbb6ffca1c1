import { Router } from "express";
import { getAllDefaults, getDefaults } from "../repo/defaultsRepo.js";
import { halfLifeFromK } from "../services/landgem/decay.js";

export const defaults = Router();

defaults.get("/", (_req, res) => {
  res.json(getAllDefaults().map((b) => ({ ...b, halfLifeYears: halfLifeFromK(b.k) })));
});

defaults.get("/:name", (req, res) => {
  const b = getDefaults(req.params.name);
  res.json({ ...b, halfLifeYears: halfLifeFromK(b.k) });
});
