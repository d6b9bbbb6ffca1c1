import type { ErrorRequestHandler } from "express";
import { AppError } from "./errors.js";

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json({ error: err.code, message: err.message, details: err.details });
  }
  // body-parser failures carry a 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return res.status(400).json({ error: "bad-json", message: err.message });
  }
  console.error(`[api] ${req.method} ${req.originalUrl} failed:`, err);
  return res.status(500).json({ error: "internal_error", message: String(err) });
};
