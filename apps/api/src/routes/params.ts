import express from "express";
import { z } from "zod";
import { serverConfig } from "../config.js";
import { getDefaults } from "../repo/defaultsRepo.js";
import { ModelParametersSchema, type ModelParameters } from "../types.js";
import { ParameterError } from "../util/errors.js";

// Either a named default bundle, explicit parameters, or a bundle with overrides
export const ModelSourceSchema = z.object({
  defaults: z.string().min(1).optional(),
  params: ModelParametersSchema.partial().optional(),
});

export const CalcOptionsSchema = z.object({
  collectionEfficiency: z.number().default(0),
  includeNmoc: z.boolean().default(false),
});

export const YearSchema = z.number().int();

export function projectionYearsSchema() {
  return z.array(YearSchema).min(1).max(serverConfig().MAX_PROJECTION_YEARS);
}

export function resolveModelParameters(src: z.infer<typeof ModelSourceSchema>): ModelParameters {
  const base = src.defaults ? getDefaults(src.defaults) : undefined;
  const merged = {
    k: src.params?.k ?? base?.k,
    L0: src.params?.L0 ?? base?.L0,
    methaneContent: src.params?.methaneContent ?? base?.methaneContent,
    nmocConcentration: src.params?.nmocConcentration ?? base?.nmocConcentration,
  };
  const parsed = ModelParametersSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ParameterError("k and L0 are required (directly or through a defaults bundle)", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}

export const WORKBOOK_TYPES = [
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/vnd.ms-excel",
];

// CSV arrives as text, .xlsx/.xls as raw bytes
export const importBodyParsers = [
  express.text({ type: ["text/csv", "text/plain"], limit: "2mb" }),
  express.raw({ type: WORKBOOK_TYPES, limit: "10mb" }),
];
