export const INVALID_PRODUCT_KEY = "NAN";

export type ProductId =
  | { kind: "numeric"; value: string }
  | { kind: "invalid"; raw: string | null };

const NUMERIC_ID_PATTERN = /^(\d+)(?:\.0*)?$/;

/**
 * Normalize a raw Item No. / component No. cell.
 *
 * Spreadsheet exports frequently render integer ids as "1042.0" or pad them
 * with zeros; all of "1042", "01042" and "1042.0" map to the same id.
 */
export function normalizeProductId(raw: string | null | undefined): ProductId {
  if (raw === null || raw === undefined) return { kind: "invalid", raw: null };

  const trimmed = raw.trim();
  const match = NUMERIC_ID_PATTERN.exec(trimmed);
  if (!match) return { kind: "invalid", raw: trimmed };

  const digits = match[1].replace(/^0+(?=\d)/, "");
  return { kind: "numeric", value: digits };
}

export function productKey(id: ProductId): string {
  return id.kind === "numeric" ? id.value : INVALID_PRODUCT_KEY;
}

export function isValidProductId(id: ProductId): id is { kind: "numeric"; value: string } {
  return id.kind === "numeric";
}
