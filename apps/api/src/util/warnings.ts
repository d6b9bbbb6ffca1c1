export type WarningCode = "ATYPICAL_METHANE_CONTENT" | "DUPLICATE_YEARS";

export type SoftWarning = {
  code: WarningCode;
  message: string;
};

export function softWarn(scope: string, code: WarningCode, message: string): SoftWarning {
  console.warn(`[${scope}] ${message}`);
  return { code, message };
}
