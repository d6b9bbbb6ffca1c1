export const LANDGEM = {
  SLICES_PER_YEAR: 10, // sub-annual deposit slices, width 0.1 year
  K_MAX: 1.0, // 1/year
  L0_MAX: 500, // m³/Mg
  CH4_TYPICAL_MIN: 0.4,
  CH4_TYPICAL_MAX: 0.6,
  MW_HEXANE: 86.18, // g/mol
  MW_METHANE: 16.04, // g/mol
  NMOC_DIVISOR: 3.6e9,
} as const;

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    console.warn(`[config] ignoring ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return n;
}

export function serverConfig() {
  return {
    PORT: intFromEnv("PORT", 3001),
    MAX_PROJECTION_YEARS: intFromEnv("MAX_PROJECTION_YEARS", 500),
  } as const;
}

export function publicConfig() {
  return {
    LANDGEM,
    server: serverConfig(),
  } as const;
}
