import type { Catalogue } from "./catalogue";
import { unresolvedComponentDiagnostic, type DiagnosticLog } from "./diagnostics";

/**
 * Flag every component reference that names a product with no definition of
 * its own. The diagnostic is attached to the referencing product.
 */
export function validateCatalogue(catalogue: Catalogue, diagnostics: DiagnosticLog): void {
  for (const product of catalogue) {
    for (const ref of product.components) {
      if (catalogue.has(ref.componentKey)) continue;
      diagnostics.append(unresolvedComponentDiagnostic(product.key, ref.componentKey));
    }
  }
}
