import fs from "fs";
import { z } from "zod";
import { DefaultBundleSchema, type DefaultBundle } from "../types.js";
import { LookupError } from "../util/errors.js";

const DATA_URL = new URL("../../data/defaults.json", import.meta.url);

const CatalogSchema = z.array(DefaultBundleSchema);

let CATALOG: DefaultBundle[] | null = null;

function loadCatalog(): DefaultBundle[] {
  if (CATALOG) return CATALOG;
  const raw = fs.readFileSync(DATA_URL, "utf8");
  // Strip potential BOM from JSON files
  const json: unknown = JSON.parse(raw.replace(/^\uFEFF/, ""));
  const parsed = CatalogSchema.safeParse(json);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid default parameter catalog: ${msg}`);
  }
  const names = new Set<string>();
  for (const b of parsed.data) {
    if (names.has(b.name)) console.warn(`[defaultsRepo] duplicate bundle ${b.name}; last one wins`);
    names.add(b.name);
  }
  CATALOG = parsed.data;
  return CATALOG;
}

export function getAllDefaults(): DefaultBundle[] {
  return loadCatalog();
}

export function findDefaults(name: string): DefaultBundle | undefined {
  const all = loadCatalog();
  for (let i = all.length - 1; i >= 0; i--) {
    if (all[i].name === name) return all[i];
  }
  return undefined;
}

export function getDefaults(name: string): DefaultBundle {
  const bundle = findDefaults(name);
  if (!bundle) throw new LookupError(`Default parameter set '${name}' not found`, { name });
  return bundle;
}
