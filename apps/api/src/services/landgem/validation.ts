import { LANDGEM } from "../../config.js";
import type { ModelParameters, WasteHistory } from "../../types.js";
import { InputShapeError, ParameterError } from "../../util/errors.js";
import { softWarn, type SoftWarning } from "../../util/warnings.js";

const SCOPE = "landgem";

function requireFinite(name: string, value: number) {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ParameterError(`${name} must be a finite number, got ${String(value)}`, { [name]: value });
  }
}

/**
 * Checks k, L0 and methane content against their hard domains and returns
 * advisory warnings for values that are valid but atypical.
 */
export function validateModelParameters(
  params: Pick<ModelParameters, "k" | "L0" | "methaneContent">,
): SoftWarning[] {
  const { k, L0, methaneContent } = params;
  requireFinite("k", k);
  requireFinite("L0", L0);
  requireFinite("methaneContent", methaneContent);

  if (k <= 0) throw new ParameterError(`k must be positive, got ${k}`, { k });
  if (k > LANDGEM.K_MAX) {
    throw new ParameterError(`k unusually high (>${LANDGEM.K_MAX}), got ${k}. Check units (1/year)`, { k });
  }
  if (L0 <= 0) throw new ParameterError(`L0 must be positive, got ${L0}`, { L0 });
  if (L0 > LANDGEM.L0_MAX) {
    throw new ParameterError(`L0 unusually high (>${LANDGEM.L0_MAX}), got ${L0}. Check units (m³/Mg)`, { L0 });
  }
  if (!(methaneContent > 0 && methaneContent < 1)) {
    throw new ParameterError(`methaneContent must be between 0 and 1, got ${methaneContent}`, { methaneContent });
  }

  const warnings: SoftWarning[] = [];
  if (methaneContent < LANDGEM.CH4_TYPICAL_MIN || methaneContent > LANDGEM.CH4_TYPICAL_MAX) {
    warnings.push(
      softWarn(
        SCOPE,
        "ATYPICAL_METHANE_CONTENT",
        `methaneContent ${methaneContent} outside typical range (${LANDGEM.CH4_TYPICAL_MIN}-${LANDGEM.CH4_TYPICAL_MAX})`,
      ),
    );
  }
  return warnings;
}

export function assertSameLength(waste: WasteHistory) {
  if (waste.years.length !== waste.amounts.length) {
    throw new InputShapeError(
      `years and amounts must have same length: ${waste.years.length} != ${waste.amounts.length}`,
      { years: waste.years.length, amounts: waste.amounts.length },
    );
  }
}

export function assertCollectionEfficiency(collectionEfficiency: number) {
  if (!(collectionEfficiency >= 0 && collectionEfficiency <= 1)) {
    throw new InputShapeError(`collectionEfficiency must be between 0 and 1, got ${collectionEfficiency}`, {
      collectionEfficiency,
    });
  }
}

/**
 * Full check of imported waste data: non-empty, equal lengths, non-negative
 * amounts, non-decreasing years. Repeated years only warn.
 */
export function validateWasteData(waste: WasteHistory): SoftWarning[] {
  const { years, amounts } = waste;
  if (years.length === 0) throw new InputShapeError("years is empty");
  assertSameLength(waste);

  const negativeAt = amounts.findIndex((a) => a < 0);
  if (negativeAt >= 0) {
    throw new InputShapeError("amounts cannot be negative", { index: negativeAt, amount: amounts[negativeAt] });
  }

  let duplicate = false;
  for (let i = 1; i < years.length; i++) {
    if (years[i] < years[i - 1]) {
      throw new InputShapeError("years must be in ascending order", { index: i, year: years[i] });
    }
    if (years[i] === years[i - 1]) duplicate = true;
  }

  return duplicate ? [softWarn(SCOPE, "DUPLICATE_YEARS", "Duplicate years found in waste years")] : [];
}
