import { z } from "zod";

// Domain types

// Waste acceptance history: years[i] received amounts[i] Mg
export type WasteHistory = {
  years: number[];
  amounts: number[];
};

export type DecayParameters = {
  k: number; // 1/year
  L0: number; // m³/Mg
};

export type CompositionParameters = {
  methaneContent: number; // CH4 volume fraction of total gas
  nmocConcentration?: number; // ppm as hexane
};

export type ModelParameters = DecayParameters & CompositionParameters;

export type EmissionsResult = {
  ch4_generation_rate: number; // m³/year
  total_gas_rate: number; // m³/year
  co2_rate: number; // m³/year
  ch4_collected_rate: number; // m³/year
  total_gas_collected_rate: number; // m³/year
  nmoc_rate?: number; // Mg/year, present only when requested and configured
};

export type SeriesRow = EmissionsResult & {
  year: number;
  cumulative_ch4: number; // m³
  cumulative_total_gas: number; // m³
};

export type SeriesColumn = keyof SeriesRow;

export type EmissionsSeries = {
  columns: SeriesColumn[];
  rows: SeriesRow[];
};

export type MultiStreamResult = EmissionsResult & {
  streams: Record<string, EmissionsResult>;
};

export type MultiStreamSeriesRow = {
  year: number;
  ch4_generation_rate: number;
  total_gas_rate: number;
  co2_rate: number;
  streams: Record<string, number>; // per-stream CH4, m³/year
  cumulative_ch4: number;
};

export type MultiStreamSeries = {
  streamNames: string[];
  rows: MultiStreamSeriesRow[];
};

export type GasComposition = {
  year: number;
  ch4_generation_rate: number;
  co2_rate: number;
  ch4_fraction: number;
  co2_fraction: number;
};

// Zod schemas

export const WasteHistorySchema = z.object({
  years: z.array(z.number().int()),
  amounts: z.array(z.number().finite()),
});

export const ModelParametersSchema = z.object({
  k: z.number().finite(),
  L0: z.number().finite(),
  methaneContent: z.number().finite().default(0.5),
  nmocConcentration: z.number().nonnegative().optional(),
});

export const DefaultBundleSchema = z
  .object({
    name: z.string().min(1),
    label: z.string().min(1),
    k: z.number().positive(),
    L0: z.number().positive(),
    methaneContent: z.number().gt(0).lt(1),
    nmocConcentration: z.number().nonnegative(),
  })
  .strict();

export type DefaultBundle = z.infer<typeof DefaultBundleSchema>;
