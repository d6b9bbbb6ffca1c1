import type {
  CompositionParameters,
  EmissionsResult,
  MultiStreamResult,
  MultiStreamSeries,
  MultiStreamSeriesRow,
  WasteHistory,
} from "../../types.js";
import { InputShapeError } from "../../util/errors.js";
import type { SoftWarning } from "../../util/warnings.js";
import { LandfillGasModel, type CalculateOptions } from "./singleStream.js";

const SUMMED_KEYS = [
  "ch4_generation_rate",
  "total_gas_rate",
  "co2_rate",
  "ch4_collected_rate",
  "total_gas_collected_rate",
] as const;

/**
 * Several waste streams (MSW, organics, C&D, ...) sharing one k and gas
 * composition, each with its own L0. Streams are keyed by name; adding a
 * name again replaces the earlier definition.
 */
export class MultiStreamModel {
  readonly k: number;
  readonly composition: CompositionParameters;
  private readonly streams = new Map<string, LandfillGasModel>();

  constructor(k: number, composition: CompositionParameters = { methaneContent: 0.5 }) {
    this.k = k;
    this.composition = composition;
  }

  addStream(name: string, L0: number): SoftWarning[] {
    const model = new LandfillGasModel({ k: this.k, L0, ...this.composition });
    this.streams.set(name, model);
    return model.warnings;
  }

  streamNames(): string[] {
    return [...this.streams.keys()];
  }

  getStream(name: string): LandfillGasModel | undefined {
    return this.streams.get(name);
  }

  calculateMultiStream(
    waste: Record<string, WasteHistory>,
    calculationYear: number,
    opts: CalculateOptions = {},
  ): MultiStreamResult {
    const totals: EmissionsResult = {
      ch4_generation_rate: 0,
      total_gas_rate: 0,
      co2_rate: 0,
      ch4_collected_rate: 0,
      total_gas_collected_rate: 0,
    };
    const streams: Record<string, EmissionsResult> = {};

    for (const [name, history] of Object.entries(waste)) {
      const model = this.streams.get(name);
      if (!model) throw new InputShapeError(`Stream '${name}' not defined`, { stream: name });

      const r = model.calculateEmissions(history, calculationYear, opts);
      streams[name] = r;
      for (const key of SUMMED_KEYS) totals[key] += r[key];
    }

    if (opts.includeNmoc && this.composition.nmocConcentration) {
      totals.nmoc_rate = Object.values(streams).reduce((s, r) => s + (r.nmoc_rate ?? 0), 0);
    }

    return { ...totals, streams };
  }

  /**
   * Combined CH4, total gas and CO2 per year, each stream's CH4, and a
   * running CH4 total in the order the years are given.
   */
  calculateTimeSeriesMultiStream(
    waste: Record<string, WasteHistory>,
    projectionYears: number[],
    collectionEfficiency = 0,
  ): MultiStreamSeries {
    let cumulative = 0;
    const rows: MultiStreamSeriesRow[] = projectionYears.map((year) => {
      const r = this.calculateMultiStream(waste, year, { collectionEfficiency });
      const perStream: Record<string, number> = {};
      for (const [name, s] of Object.entries(r.streams)) perStream[name] = s.ch4_generation_rate;
      cumulative += r.ch4_generation_rate;
      return {
        year,
        ch4_generation_rate: r.ch4_generation_rate,
        total_gas_rate: r.total_gas_rate,
        co2_rate: r.co2_rate,
        streams: perStream,
        cumulative_ch4: cumulative,
      };
    });

    return { streamNames: Object.keys(waste), rows };
  }

  toString(): string {
    return `MultiStreamModel(k=${this.k}, streams=[${this.streamNames().join(", ")}])`;
  }
}
