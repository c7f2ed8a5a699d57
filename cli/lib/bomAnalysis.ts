import type { BomRow } from "../../shared/bom/bomRow";
import { buildCatalogue, type Catalogue } from "../../shared/bom/catalogue";
import { computeRolledUpCost, type RollupResult } from "../../shared/bom/costRollup";
import { computeDepths, type DepthReport } from "../../shared/bom/depthAnalyzer";
import type { DiagnosticLog } from "../../shared/bom/diagnostics";
import { validateCatalogue } from "../../shared/bom/validateCatalogue";
import { logger } from "../logger";
import type { IngestionIssue } from "./bomCsvIngestion";

export type ProductCostSummary = {
  result: RollupResult;
  /** Diagnostics raised while crawling this product's expansion. */
  warnings: string[];
};

export type BomAnalysis = {
  catalogue: Catalogue;
  issues: IngestionIssue[];
  /** Ingestion and validation diagnostics per product key, catalogue order. */
  sourceWarnings: Map<string, string[]>;
  depths: DepthReport;
  depthWarnings: Map<string, string[]>;
  costs: ProductCostSummary[];
};

function snapshotWarnings(catalogue: Catalogue, diagnostics: DiagnosticLog): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const product of catalogue) {
    const messages = diagnostics.messagesFor(product.key);
    if (messages.length > 0) out.set(product.key, messages);
  }
  return out;
}

/**
 * Build the catalogue and run validation, depth and cost passes in order.
 * Diagnostics are reset between passes so each section reports only its own.
 *
 * @throws BomCycleError on cyclic input; nothing partial is returned
 */
export function analyseBom(rows: readonly BomRow[], issues: IngestionIssue[] = []): BomAnalysis {
  const { catalogue, diagnostics } = buildCatalogue(rows);
  logger.info("Catalogue built", { products: catalogue.size, rows: rows.length, rejectedRows: issues.length });

  validateCatalogue(catalogue, diagnostics);
  const sourceWarnings = snapshotWarnings(catalogue, diagnostics);
  logger.debug("Catalogue validated", { warnings: diagnostics.count });

  diagnostics.reset();
  const depths = computeDepths(catalogue, diagnostics);
  const depthWarnings = snapshotWarnings(catalogue, diagnostics);

  const costs: ProductCostSummary[] = [];
  for (const product of catalogue) {
    diagnostics.reset();
    const result = computeRolledUpCost(catalogue, product.key, diagnostics);
    costs.push({ result, warnings: diagnostics.all().map((d) => d.message) });
  }
  logger.info("Rolled-up costs computed", { products: costs.length });

  return { catalogue, issues, sourceWarnings, depths, depthWarnings, costs };
}
