import type { EmissionsSeries, GasComposition, SeriesRow } from "../../types.js";
import { LookupError } from "../../util/errors.js";

// CH4/CO2 split of one year in a series
export function compositionAtYear(series: EmissionsSeries, year: number): GasComposition {
  const row = series.rows.find((r) => r.year === year);
  if (!row) throw new LookupError(`Year ${year} not found in series`, { year });

  const ch4 = row.ch4_generation_rate;
  const co2 = row.co2_rate;
  const total = ch4 + co2;
  return {
    year,
    ch4_generation_rate: ch4,
    co2_rate: co2,
    ch4_fraction: total > 0 ? ch4 / total : 0,
    co2_fraction: total > 0 ? co2 / total : 0,
  };
}

export function peakYear(series: EmissionsSeries): SeriesRow | undefined {
  let best: SeriesRow | undefined;
  for (const row of series.rows) {
    if (!best || row.ch4_generation_rate > best.ch4_generation_rate) best = row;
  }
  return best;
}
