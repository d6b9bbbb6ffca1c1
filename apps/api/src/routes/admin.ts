import { Router } from "express";
import { publicConfig } from "../config.js";

export const admin = Router();

admin.get("/config", (_req, res) => {
  const cfg = publicConfig();
  res.json({
    LANDGEM: cfg.LANDGEM,
    server: cfg.server,
    ts: Date.now(),
  });
});
