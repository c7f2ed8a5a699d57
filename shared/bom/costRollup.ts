import type { ReplenishmentSystem } from "./bomRow";
import type { Catalogue } from "./catalogue";
import { runCrawl } from "./componentCrawl";
import type { DiagnosticLog } from "./diagnostics";

export type RollupLine = {
  /** Level below the root; direct components are level 1. */
  level: number;
  parentKey: string;
  componentKey: string;
  quantityPer: number;
  quantityPerTop: number;
  replenishmentSystem: ReplenishmentSystem;
  unitCost: number;
  /** unitCost x quantityPerTop for purchased components, otherwise 0. */
  componentCost: number;
};

export type RollupResult = {
  rootKey: string;
  /** Unrounded sum of componentCost over every line. */
  totalCost: number;
  /**
   * Cumulative multiplier per visited product relative to the root. A product
   * reached along several branches keeps the value of the last branch crawled.
   */
  quantityPerTop: Map<string, number>;
  lines: RollupLine[];
};

export function computeRolledUpCost(catalogue: Catalogue, rootKey: string, diagnostics: DiagnosticLog): RollupResult {
  let totalCost = 0;
  const quantityPerTop = new Map<string, number>([[rootKey, 1]]);
  const lines: RollupLine[] = [];

  runCrawl(catalogue, rootKey, diagnostics, (edge) => {
    if (!edge.resolved) return;

    const { child } = edge;
    quantityPerTop.set(child.key, edge.quantityPerTop);

    // Manufactured items contribute nothing themselves; their own components
    // are still crawled.
    const componentCost = child.replenishmentSystem === "Purchase" ? child.unitCost * edge.quantityPerTop : 0;
    totalCost += componentCost;

    lines.push({
      level: edge.level,
      parentKey: edge.parent.key,
      componentKey: child.key,
      quantityPer: edge.ref.quantityPer,
      quantityPerTop: edge.quantityPerTop,
      replenishmentSystem: child.replenishmentSystem,
      unitCost: child.unitCost,
      componentCost,
    });
  });

  return { rootKey, totalCost, quantityPerTop, lines };
}

export function computeRolledUpCosts(catalogue: Catalogue, diagnostics: DiagnosticLog): RollupResult[] {
  const results: RollupResult[] = [];
  for (const product of catalogue) {
    results.push(computeRolledUpCost(catalogue, product.key, diagnostics));
  }
  return results;
}
