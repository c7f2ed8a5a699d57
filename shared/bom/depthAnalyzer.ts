import type { Catalogue } from "./catalogue";
import { runCrawl } from "./componentCrawl";
import type { DiagnosticLog } from "./diagnostics";

export type DepthReport = {
  /** Product key -> length of its longest component chain, in catalogue order. */
  depths: Map<string, number>;
};

/**
 * Length of the longest chain of component expansion below `rootKey`.
 * Every reference counts one level; an unresolved reference ends its chain
 * there and records a diagnostic against the product holding it.
 */
export function computeDepth(catalogue: Catalogue, rootKey: string, diagnostics: DiagnosticLog): number {
  let maxLevel = 0;
  runCrawl(catalogue, rootKey, diagnostics, (edge) => {
    if (edge.level > maxLevel) maxLevel = edge.level;
  });
  return maxLevel;
}

export function computeDepths(catalogue: Catalogue, diagnostics: DiagnosticLog): DepthReport {
  const depths = new Map<string, number>();
  for (const product of catalogue) {
    depths.set(product.key, computeDepth(catalogue, product.key, diagnostics));
  }
  return { depths };
}
