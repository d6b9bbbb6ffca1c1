import { Router } from "express";
import { getAllDefaults } from "../repo/defaultsRepo.js";

export const health = Router().get("/", (_req, res) =>
  res.json({ ok: true, service: "landgas-api", defaultBundles: getAllDefaults().length, ts: Date.now() }),
);
