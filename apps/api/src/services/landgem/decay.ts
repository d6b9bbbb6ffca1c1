import { LANDGEM } from "../../config.js";
import type { WasteHistory } from "../../types.js";
import { assertSameLength } from "./validation.js";

/**
 * First-order decay methane generation for one calculation year (m³/year).
 *
 *   Q = Σ_i Σ_j (k · L0 · M_i / 10) · e^(−k · t_ij),   j = 0.0, 0.1, … 0.9
 *
 * Each annual cohort is spread over ten sub-annual slices; slice j of the
 * cohort accepted in year Y has age t = calculationYear − Y + (1 − j).
 * Cohorts accepted after the calculation year contribute nothing.
 */
export function firstOrderDecay(
  waste: WasteHistory,
  calculationYear: number,
  k: number,
  L0: number,
): number {
  assertSameLength(waste);
  const { years, amounts } = waste;
  const slices = LANDGEM.SLICES_PER_YEAR;
  const sliceWidth = 1 / slices;

  let totalCh4 = 0;
  for (let i = 0; i < years.length; i++) {
    const year = years[i];
    if (year > calculationYear) continue; // future waste

    const sliceCapacity = (k * L0 * amounts[i]) / slices;
    for (let s = 0; s < slices; s++) {
      const j = s * sliceWidth;
      const age = calculationYear - year + (1 - j);
      totalCh4 += sliceCapacity * Math.exp(-k * age);
    }
  }
  return totalCh4;
}

/**
 * Mass accepted up to and including `calculationYear`, scaled by
 * (1 − decayFraction). The fraction is not range-checked.
 */
export function wasteInPlace(
  waste: WasteHistory,
  calculationYear: number,
  decayFraction = 0,
): number {
  assertSameLength(waste);
  let total = 0;
  waste.years.forEach((year, i) => {
    if (year <= calculationYear) total += waste.amounts[i];
  });
  return total * (1 - decayFraction);
}

export function kFromHalfLife(halfLifeYears: number): number {
  return Math.LN2 / halfLifeYears;
}

export function halfLifeFromK(k: number): number {
  return Math.LN2 / k;
}
