import Papa from "papaparse";
import { replenishmentLabel } from "../../shared/bom/bomRow";
import type { Catalogue } from "../../shared/bom/catalogue";
import type { RollupLine } from "../../shared/bom/costRollup";
import { round2dp, round4dp } from "../../shared/bom/rounding";
import type { BomAnalysis, ProductCostSummary } from "./bomAnalysis";

export type ReportMode = "concise" | "verbose";

export type TextReportOptions = {
  mode: ReportMode;
  listComponents?: boolean;
};

const WARNING_INDENT = "     ";

function banner(title: string): string[] {
  const rule = "=".repeat(title.length + 8);
  return [rule, `=== ${title} ===`, rule];
}

function formatNumber(value: number, round: (n: number) => number): string {
  return String(round(value));
}

export function renderWarningsSection(analysis: BomAnalysis): string[] {
  const lines = banner("Warnings About Source Data");
  for (const issue of analysis.issues) {
    lines.push(`${WARNING_INDENT}Row ${issue.rowIndex} rejected: ${issue.message}`);
  }
  for (const messages of analysis.sourceWarnings.values()) {
    for (const message of messages) lines.push(`${WARNING_INDENT}${message}`);
  }
  return lines;
}

export function renderDepthSection(analysis: BomAnalysis, mode: ReportMode): string[] {
  const lines = banner("Product Levels per Product");
  for (const [key, depth] of analysis.depths.depths) {
    lines.push(`Item ${key} Level - ${depth}`);
    if (mode === "verbose") {
      for (const message of analysis.depthWarnings.get(key) ?? []) lines.push(`${WARNING_INDENT}${message}`);
    }
  }
  return lines;
}

export function renderRollupLine(line: RollupLine): string[] {
  const indent = "\t".repeat(line.level);
  return [
    `${indent}${line.componentKey}\tQtyPer:${formatNumber(line.quantityPer, round2dp)}` +
      `\tCompCost:${formatNumber(line.componentCost, round2dp)}` +
      `\tQtyPerTop:${formatNumber(line.quantityPerTop, round2dp)}`,
    `${indent}Replen:${replenishmentLabel(line.replenishmentSystem)}\tUnitCost:${line.unitCost}`,
  ];
}

function renderCostSummary(summary: ProductCostSummary, mode: ReportMode): string[] {
  const { result, warnings } = summary;
  const total = formatNumber(result.totalCost, round4dp);

  if (mode === "concise") {
    return [`Product ${result.rootKey} Rolled Up Cost: ${total}`, ...warnings.map((w) => `${WARNING_INDENT}${w}`)];
  }

  const lines = [`Product: ${result.rootKey}`];
  for (const line of result.lines) lines.push(...renderRollupLine(line));
  for (const w of warnings) lines.push(`${WARNING_INDENT}${w}`);
  lines.push(`   TOTAL COMPONENT COST: ${total}`, "");
  return lines;
}

export function renderCostSection(analysis: BomAnalysis, mode: ReportMode): string[] {
  const lines = banner(`Product Rolled Up Costs (${mode})`);
  for (const summary of analysis.costs) lines.push(...renderCostSummary(summary, mode));
  return lines;
}

export function renderCatalogueListing(catalogue: Catalogue): string[] {
  const lines = banner("Products and Components");
  for (const product of catalogue) {
    lines.push(product.key);
    for (const ref of product.components) {
      lines.push(`   Component: ${ref.componentKey}   Qty Per: ${ref.quantityPer}`);
    }
  }
  return lines;
}

export function renderTextReport(analysis: BomAnalysis, options: TextReportOptions): string {
  const sections = [
    renderWarningsSection(analysis),
    renderDepthSection(analysis, options.mode),
    renderCostSection(analysis, options.mode),
  ];
  if (options.listComponents) sections.push(renderCatalogueListing(analysis.catalogue));

  return sections.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}

export const CSV_REPORT_FIELDS = ["Product", "Replenishment System", "Depth", "Rolled Up Cost", "Warnings"];

export function renderCsvReport(analysis: BomAnalysis): string {
  const data = analysis.costs.map(({ result, warnings }) => {
    const product = analysis.catalogue.get(result.rootKey);
    const sourceWarnings = analysis.sourceWarnings.get(result.rootKey) ?? [];
    return [
      result.rootKey,
      product ? replenishmentLabel(product.replenishmentSystem) : "",
      analysis.depths.depths.get(result.rootKey) ?? "",
      round4dp(result.totalCost),
      // The crawl re-derives unresolved references the validator already reported.
      Array.from(new Set([...sourceWarnings, ...warnings])).join(" | "),
    ];
  });

  return Papa.unparse({ fields: CSV_REPORT_FIELDS, data }) + "\r\n";
}
