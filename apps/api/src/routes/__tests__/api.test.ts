import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import type { Server } from "http";
import axios, { type AxiosInstance } from "axios";
import { createApp } from "../../app.js";
import { tableToWorkbook } from "../../services/exportService.js";

const XLSX_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

let server: Server;
let api: AxiosInstance;

beforeAll(async () => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
  server = createApp().listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  api = axios.create({ baseURL: `http://127.0.0.1:${addr.port}`, validateStatus: () => true });
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

const oneCohort = { years: [2020], amounts: [5000] };

describe("GET /health and /admin/config", () => {
  it("reports service status", async () => {
    const res = await api.get("/health");
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ ok: true, service: "landgas-api", defaultBundles: 9 });
  });

  it("exposes the model constants", async () => {
    const res = await api.get("/admin/config");
    expect(res.data.LANDGEM.SLICES_PER_YEAR).toBe(10);
    expect(res.data.LANDGEM.NMOC_DIVISOR).toBe(3.6e9);
  });
});

describe("/defaults and /tools", () => {
  it("lists and fetches bundles", async () => {
    const all = await api.get("/defaults");
    expect(all.data).toHaveLength(9);
    const wet = await api.get("/defaults/caa_wet");
    expect(wet.data).toMatchObject({ name: "caa_wet", k: 0.7, L0: 170 });
    expect(wet.data.halfLifeYears).toBeCloseTo(Math.LN2 / 0.7, 12);
  });

  it("answers 404 for an unknown bundle", async () => {
    const res = await api.get("/defaults/tropical");
    expect(res.status).toBe(404);
    expect(res.data.error).toBe("NOT_FOUND");
  });

  it("converts between k and half-life", async () => {
    const h = await api.get("/tools/half-life", { params: { k: 0.05 } });
    expect(h.data.halfLifeYears).toBeCloseTo(13.862943611198904, 12);
    const k = await api.get("/tools/k", { params: { halfLife: 10 } });
    expect(k.data.k).toBeCloseTo(Math.LN2 / 10, 15);
    const bad = await api.get("/tools/k", { params: { halfLife: 0 } });
    expect(bad.status).toBe(400);
    expect(bad.data.error).toBe("bad-params");
  });
});

describe("POST /emissions", () => {
  it("computes one year from a defaults bundle", async () => {
    const res = await api.post("/emissions", {
      defaults: "caa_conventional",
      waste: oneCohort,
      year: 2020,
      collectionEfficiency: 0.75,
      includeNmoc: true,
    });
    expect(res.status).toBe(200);
    expect(res.data.params).toEqual({ k: 0.05, L0: 170, methaneContent: 0.5, nmocConcentration: 4000 });
    expect(res.data.result.ch4_generation_rate).toBeCloseTo(41351.4380659819, 6);
    expect(res.data.result.ch4_collected_rate).toBeCloseTo(31013.578549486425, 6);
    expect(res.data.result.nmoc_rate).toBeCloseTo(0.49371944202359663, 12);
    expect(res.data.warnings).toEqual([]);
  });

  it("lets explicit parameters override the bundle", async () => {
    const res = await api.post("/emissions", {
      defaults: "caa_conventional",
      params: { L0: 100, methaneContent: 0.65 },
      waste: oneCohort,
      year: 2019,
    });
    expect(res.status).toBe(200);
    expect(res.data.params).toMatchObject({ k: 0.05, L0: 100, methaneContent: 0.65 });
    expect(res.data.result.ch4_generation_rate).toBe(0);
    expect(res.data.warnings.map((w: { code: string }) => w.code)).toEqual(["ATYPICAL_METHANE_CONTENT"]);
  });

  it.each([
    [{ params: { L0: 100 }, waste: oneCohort, year: 2020 }, 400, "INVALID_PARAMETER"],
    [{ params: { k: 1.5, L0: 170 }, waste: oneCohort, year: 2020 }, 400, "INVALID_PARAMETER"],
    [{ params: { k: 0.05, L0: 170 }, waste: oneCohort, year: 2020, collectionEfficiency: 2 }, 400, "INVALID_INPUT"],
    [{ params: { k: 0.05, L0: 170 }, waste: { years: [2020, 2021], amounts: [1] }, year: 2020 }, 400, "INVALID_INPUT"],
    [{ defaults: "tropical", waste: oneCohort, year: 2020 }, 404, "NOT_FOUND"],
    [{ params: { k: 0.05, L0: 170 }, waste: "none", year: 2020 }, 400, "bad-params"],
  ])("rejects %o", async (body, status, code) => {
    const res = await api.post("/emissions", body);
    expect(res.status).toBe(status);
    expect(res.data.error).toBe(code);
  });
});

describe("POST /emissions/series", () => {
  const body = {
    defaults: "caa_conventional",
    waste: { years: [2020, 2021], amounts: [5000, 5200] },
    projectionYears: [2025, 2021, 2023],
  };

  it("returns rows, columns and the peak year", async () => {
    const res = await api.post("/emissions/series", body);
    expect(res.status).toBe(200);
    expect(res.data.columns).toEqual([
      "year",
      "ch4_generation_rate",
      "total_gas_rate",
      "co2_rate",
      "cumulative_ch4",
      "cumulative_total_gas",
    ]);
    expect(res.data.rows.map((r: { year: number }) => r.year)).toEqual([2025, 2021, 2023]);
    expect(res.data.peak.year).toBe(2021);
    expect(res.data.peak.ch4_generation_rate).toBeCloseTo(82340.20022240207, 6);
  });

  it("renders CSV on request", async () => {
    const res = await api.post("/emissions/series", body, {
      params: { format: "csv", metadata: "false" },
      responseType: "text",
    });
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/csv/);
    const lines = String(res.data).split("\n");
    expect(lines[0]).toBe("year,ch4_generation_rate,total_gas_rate,co2_rate,cumulative_ch4,cumulative_total_gas");
    expect(lines.map((l) => l.split(",")[0])).toEqual(["year", "2025", "2021", "2023", ""]);
  });

  it("rejects an unknown format", async () => {
    const res = await api.post("/emissions/series", body, { params: { format: "pdf" } });
    expect(res.status).toBe(400);
  });
});

describe("other /emissions endpoints", () => {
  it("returns composition for a year in the series", async () => {
    const res = await api.post("/emissions/composition", {
      params: { k: 0.05, L0: 170, methaneContent: 0.5 },
      waste: oneCohort,
      projectionYears: [2025, 2030],
      year: 2030,
    });
    expect(res.status).toBe(200);
    expect(res.data.ch4_fraction).toBeCloseTo(0.5, 12);
  });

  it("answers 404 for a year outside the series", async () => {
    const res = await api.post("/emissions/composition", {
      params: { k: 0.05, L0: 170 },
      waste: oneCohort,
      projectionYears: [2025],
      year: 2030,
    });
    expect(res.status).toBe(404);
    expect(res.data.message).toBe("Year 2030 not found in series");
  });

  it("computes waste in place", async () => {
    const res = await api.post("/emissions/waste-in-place", {
      waste: { years: [2010, 2011, 2012], amounts: [100, 200, 300] },
      year: 2011,
      decayFraction: 0.5,
    });
    expect(res.data).toEqual({ year: 2011, decayFraction: 0.5, waste_in_place_mg: 150 });
  });

  it("imports a CSV history with its warnings", async () => {
    const res = await api.post("/emissions/import", "year,waste_mg\n2020,10\n2020,5\n2021,7\n", {
      headers: { "Content-Type": "text/csv" },
    });
    expect(res.status).toBe(200);
    expect(res.data.waste).toEqual({ years: [2020, 2020, 2021], amounts: [10, 5, 7] });
    expect(res.data.total_waste_mg).toBe(22);
    expect(res.data.warnings).toEqual([{ code: "DUPLICATE_YEARS", message: "Duplicate years found in waste years" }]);
  });

  it("imports a quoted CSV field containing a comma", async () => {
    const res = await api.post("/emissions/import", 'year,waste_mg\n2020,"5,000"\n', {
      headers: { "Content-Type": "text/csv" },
    });
    expect(res.status).toBe(200);
    expect(res.data.waste).toEqual({ years: [2020], amounts: [5000] });
  });

  it("imports an xlsx workbook", async () => {
    const buf = await tableToWorkbook({
      columns: ["year", "tonnes"],
      records: [
        { year: 2019, tonnes: 100 },
        { year: 2020, tonnes: 250 },
      ],
    });
    const res = await api.post("/emissions/import?amountColumn=tonnes", buf, {
      headers: { "Content-Type": XLSX_TYPE },
    });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ waste: { years: [2019, 2020], amounts: [100, 250] }, total_waste_mg: 350, warnings: [] });
  });

  it("refuses a JSON body", async () => {
    const res = await api.post("/emissions/import", { years: [2020] });
    expect(res.status).toBe(415);
    expect(res.data.error).toBe("expected-csv-or-workbook");
  });

  it("rejects a CSV without the amount column", async () => {
    const res = await api.post("/emissions/import", "year,tonnes\n2020,10\n", {
      headers: { "Content-Type": "text/csv" },
    });
    expect(res.status).toBe(400);
    expect(res.data.error).toBe("INVALID_INPUT");
  });
});

describe("/multi-stream", () => {
  const base = {
    k: 0.05,
    methaneContent: 0.5,
    streams: [
      { name: "msw", L0: 170 },
      { name: "organic", L0: 200 },
    ],
    waste: {
      msw: { years: [2020, 2021], amounts: [5000, 5200] },
      organic: { years: [2020, 2021], amounts: [1000, 1100] },
    },
  };

  it("combines streams for one year", async () => {
    const res = await api.post("/multi-stream", { ...base, year: 2030 });
    expect(res.status).toBe(200);
    const { result } = res.data;
    expect(result.ch4_generation_rate).toBe(
      0 + result.streams.msw.ch4_generation_rate + result.streams.organic.ch4_generation_rate,
    );
  });

  it("rejects waste for an unregistered stream", async () => {
    const res = await api.post("/multi-stream", {
      ...base,
      waste: { ...base.waste, cd: { years: [2020], amounts: [10] } },
      year: 2030,
    });
    expect(res.status).toBe(400);
    expect(res.data).toMatchObject({ error: "INVALID_INPUT", message: "Stream 'cd' not defined" });
  });

  it("imports stream columns from CSV", async () => {
    const res = await api.post(
      "/multi-stream/import?streams[msw]=msw_mg&streams[organic]=organic_mg",
      "year,msw_mg,organic_mg\n2020,5000,1000\n2021,5200,1100\n",
      { headers: { "Content-Type": "text/csv" } },
    );
    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      streams: ["msw", "organic"],
      waste: base.waste,
      warnings: [],
    });
  });

  it("imports stream columns from a workbook", async () => {
    const buf = await tableToWorkbook({
      columns: ["year", "msw_mg"],
      records: [{ year: 2020, msw_mg: 5000 }],
    });
    const res = await api.post("/multi-stream/import?streams[msw]=msw_mg", buf, {
      headers: { "Content-Type": XLSX_TYPE },
    });
    expect(res.status).toBe(200);
    expect(res.data.waste).toEqual({ msw: { years: [2020], amounts: [5000] } });
  });

  it("requires at least one stream column", async () => {
    const res = await api.post("/multi-stream/import", "year\n2020\n", { headers: { "Content-Type": "text/csv" } });
    expect(res.status).toBe(400);
    expect(res.data.error).toBe("bad-params");
  });

  it("builds the per-stream table", async () => {
    const res = await api.post("/multi-stream/series", { ...base, projectionYears: [2030, 2031] });
    expect(res.status).toBe(200);
    expect(res.data.columns).toEqual([
      "year",
      "ch4_generation_rate",
      "total_gas_rate",
      "co2_rate",
      "msw_ch4_generation_rate",
      "organic_ch4_generation_rate",
      "cumulative_ch4",
    ]);
    expect(res.data.records).toHaveLength(2);
    expect(res.data.records[1].cumulative_ch4).toBe(
      res.data.records[0].ch4_generation_rate + res.data.records[1].ch4_generation_rate,
    );
  });
});
