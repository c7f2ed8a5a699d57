import fs from "fs";
import Papa from "papaparse";
import type { BomRow } from "../../shared/bom/bomRow";
import { BomIngestionError } from "../../shared/bom/errors";
import { logger } from "../logger";

export type BomColumnNames = {
  productId: string;
  componentId: string;
  quantityPer: string;
  replenishmentSystem: string;
  unitCost: string;
};

export const DEFAULT_BOM_COLUMNS: BomColumnNames = {
  productId: "Item No.",
  componentId: "No.",
  quantityPer: "Quantity per",
  replenishmentSystem: "Item Replenishment System",
  unitCost: "Current Unit Cost (LCY)",
};

export type BomCsvOptions = {
  delimiter?: string;
  columns?: Partial<BomColumnNames>;
};

/** A source row the adapter refused to hand to the catalogue. */
export type IngestionIssue = {
  rowIndex: number;
  message: string;
};

export type BomCsvParseResult = {
  rows: BomRow[];
  issues: IngestionIssue[];
};

const DECIMAL_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Drop thousands separators and a single trailing decimal point, as exported
 * by the ERP ("1,250." -> "1250").
 */
export function cleanNumericText(raw: string): string {
  const s = raw.trim().replace(/,/g, "");
  return s.endsWith(".") ? s.slice(0, -1) : s;
}

/**
 * null for an empty cell, NaN for text that is not a decimal number.
 */
export function parseDecimalCell(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const cleaned = cleanNumericText(raw);
  if (cleaned === "") return null;
  if (!DECIMAL_PATTERN.test(cleaned)) return NaN;
  return Number(cleaned);
}

function cell(record: Record<string, string | undefined>, column: string): string | null {
  const value = record[column];
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

type RowOutcome = { ok: true; row: BomRow } | { ok: false; message: string };

function toBomRow(record: Record<string, string | undefined>, rowIndex: number, columns: BomColumnNames): RowOutcome {
  const productId = cell(record, columns.productId);
  const componentId = cell(record, columns.componentId);

  const rawQuantity = cell(record, columns.quantityPer);
  const quantity = parseDecimalCell(rawQuantity);
  let quantityPer: number | null = null;
  if (componentId !== null) {
    if (quantity === null) {
      return { ok: false, message: `${columns.quantityPer} is missing for component ${componentId}` };
    }
    if (Number.isNaN(quantity)) {
      return { ok: false, message: `${columns.quantityPer} "${rawQuantity ?? ""}" is not a number` };
    }
    if (!Number.isFinite(quantity) || quantity <= 0) {
      return { ok: false, message: `${columns.quantityPer} must be > 0 (read "${rawQuantity ?? ""}")` };
    }
    quantityPer = quantity;
  }

  const rawCost = cell(record, columns.unitCost);
  const cost = parseDecimalCell(rawCost);
  if (cost !== null && (!Number.isFinite(cost) || cost < 0)) {
    return { ok: false, message: `${columns.unitCost} "${rawCost ?? ""}" is not a non-negative number` };
  }

  return {
    ok: true,
    row: {
      rowIndex,
      productId,
      componentId,
      quantityPer,
      replenishmentSystem: cell(record, columns.replenishmentSystem) ?? "",
      // Manufactured items are often exported without a cost.
      unitCost: cost ?? 0,
    },
  };
}

export function parseBomCsv(text: string, options: BomCsvOptions = {}): BomCsvParseResult {
  const columns: BomColumnNames = { ...DEFAULT_BOM_COLUMNS, ...options.columns };

  const parseResult = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
    delimiter: options.delimiter ?? ",",
    transformHeader: (header: string) => header.trim(),
  });

  const fields = parseResult.meta.fields ?? [];
  const missing = Object.values(columns).filter((c) => !fields.includes(c));
  if (missing.length > 0) {
    throw new BomIngestionError(`CSV is missing required column(s): ${missing.map((m) => `"${m}"`).join(", ")}`);
  }

  const issues: IngestionIssue[] = [];
  const badRows = new Set<number>();
  for (const err of parseResult.errors) {
    if (typeof err.row !== "number") {
      throw new BomIngestionError(`CSV parsing failed: ${err.message}`);
    }
    badRows.add(err.row);
    issues.push({ rowIndex: err.row, message: `CSV parse error: ${err.message}` });
  }

  const rows: BomRow[] = [];
  parseResult.data.forEach((record, rowIndex) => {
    if (badRows.has(rowIndex)) return;
    const outcome = toBomRow(record, rowIndex, columns);
    if (outcome.ok) {
      rows.push(outcome.row);
    } else {
      issues.push({ rowIndex, message: outcome.message });
    }
  });

  issues.sort((a, b) => a.rowIndex - b.rowIndex);
  for (const issue of issues) {
    logger.warn("BOM row rejected", { rowIndex: issue.rowIndex, reason: issue.message });
  }

  return { rows, issues };
}

export function readBomCsvFile(path: string, options: BomCsvOptions = {}): BomCsvParseResult {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BomIngestionError(`Cannot read BOM file ${path}: ${reason}`);
  }

  logger.debug("Parsing BOM file", { path, bytes: text.length });
  return parseBomCsv(text, options);
}
