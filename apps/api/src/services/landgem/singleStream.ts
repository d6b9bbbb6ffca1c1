import { LANDGEM } from "../../config.js";
import type {
  EmissionsResult,
  EmissionsSeries,
  ModelParameters,
  SeriesColumn,
  SeriesRow,
  WasteHistory,
} from "../../types.js";
import type { SoftWarning } from "../../util/warnings.js";
import { firstOrderDecay, wasteInPlace } from "./decay.js";
import { assertCollectionEfficiency, assertSameLength, validateModelParameters } from "./validation.js";

export type CalculateOptions = {
  collectionEfficiency?: number; // 0..1
  includeNmoc?: boolean;
};

/**
 * Landfill gas model for one waste stream.
 *
 * Holds k, L0 and gas composition; waste data is passed on every call and
 * never retained.
 *
 * @example
 * const model = new LandfillGasModel({ k: 0.05, L0: 170, methaneContent: 0.5 });
 * model.calculateEmissions({ years: [2020, 2021], amounts: [5000, 5200] }, 2030);
 */
export class LandfillGasModel {
  readonly k: number;
  readonly L0: number;
  readonly methaneContent: number;
  readonly nmocConcentration?: number;
  readonly warnings: SoftWarning[];

  constructor(params: ModelParameters) {
    this.warnings = validateModelParameters(params);
    this.k = params.k;
    this.L0 = params.L0;
    this.methaneContent = params.methaneContent;
    this.nmocConcentration = params.nmocConcentration;
  }

  /** NMOC reports only when a non-zero concentration is configured. */
  hasNmoc(): boolean {
    return Boolean(this.nmocConcentration);
  }

  calculateEmissions(waste: WasteHistory, calculationYear: number, opts: CalculateOptions = {}): EmissionsResult {
    const collectionEfficiency = opts.collectionEfficiency ?? 0;
    assertSameLength(waste);
    assertCollectionEfficiency(collectionEfficiency);

    const ch4 = firstOrderDecay(waste, calculationYear, this.k, this.L0);
    const totalGas = ch4 / this.methaneContent;
    const co2 = totalGas * (1 - this.methaneContent);

    const result: EmissionsResult = {
      ch4_generation_rate: ch4,
      total_gas_rate: totalGas,
      co2_rate: co2,
      ch4_collected_rate: ch4 * collectionEfficiency,
      total_gas_collected_rate: totalGas * collectionEfficiency,
    };

    if (opts.includeNmoc && this.nmocConcentration) {
      result.nmoc_rate = this.nmocRate(totalGas, this.nmocConcentration);
    }
    return result;
  }

  /**
   * One result per projection year, in the order given, with running
   * cumulative CH4 and total gas over that same order.
   */
  calculateTimeSeries(waste: WasteHistory, projectionYears: number[], opts: CalculateOptions = {}): EmissionsSeries {
    let cumulativeCh4 = 0;
    let cumulativeGas = 0;

    const rows: SeriesRow[] = projectionYears.map((year) => {
      const r = this.calculateEmissions(waste, year, opts);
      cumulativeCh4 += r.ch4_generation_rate;
      cumulativeGas += r.total_gas_rate;
      return { year, ...r, cumulative_ch4: cumulativeCh4, cumulative_total_gas: cumulativeGas };
    });

    return { columns: this.seriesColumns(opts), rows };
  }

  wasteInPlace(waste: WasteHistory, calculationYear: number, decayFraction = 0): number {
    return wasteInPlace(waste, calculationYear, decayFraction);
  }

  private seriesColumns(opts: CalculateOptions): SeriesColumn[] {
    const cols: SeriesColumn[] = ["year", "ch4_generation_rate", "total_gas_rate", "co2_rate"];
    if ((opts.collectionEfficiency ?? 0) > 0) cols.push("ch4_collected_rate", "total_gas_collected_rate");
    if (opts.includeNmoc && this.hasNmoc()) cols.push("nmoc_rate");
    cols.push("cumulative_ch4", "cumulative_total_gas");
    return cols;
  }

  // Mg/year; concentration is ppm hexane, so correct by MW(hexane)/MW(methane)
  private nmocRate(totalGas: number, concentration: number): number {
    const mwFactor = LANDGEM.MW_HEXANE / LANDGEM.MW_METHANE;
    return (concentration * mwFactor * totalGas) / LANDGEM.NMOC_DIVISOR;
  }

  toString(): string {
    return `LandfillGasModel(k=${this.k}, L0=${this.L0}, methaneContent=${this.methaneContent}, nmocConcentration=${this.nmocConcentration})`;
  }
}
