export type DiagnosticSeverity = "WARNING" | "INFO";

export type DiagnosticCode =
  | "BOM_UNRESOLVED_COMPONENT"
  | "BOM_DUPLICATE_COMPONENT"
  | "BOM_INVALID_ITEM_NO"
  | "BOM_INVALID_COMPONENT_NO";

export type Diagnostic = {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  /** Key of the product the diagnostic is attached to. */
  productKey: string;
  context?: Record<string, unknown>;
};

export function warningDiagnostic(params: Omit<Diagnostic, "severity">): Diagnostic {
  return { ...params, severity: "WARNING" };
}

export function unresolvedComponentDiagnostic(productKey: string, componentKey: string): Diagnostic {
  return warningDiagnostic({
    code: "BOM_UNRESOLVED_COMPONENT",
    message: `Product ${productKey} refers to product ${componentKey} for which there is no definition in the source data.`,
    productKey,
    context: { componentKey },
  });
}

/**
 * Per-product, append-only store of diagnostics.
 *
 * Passes append; nothing is deduplicated. Callers that want one pass's output
 * in isolation call reset() before running it.
 */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];
  private readonly byProduct = new Map<string, Diagnostic[]>();

  append(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    const list = this.byProduct.get(diagnostic.productKey);
    if (list) {
      list.push(diagnostic);
    } else {
      this.byProduct.set(diagnostic.productKey, [diagnostic]);
    }
  }

  forProduct(productKey: string): readonly Diagnostic[] {
    return this.byProduct.get(productKey) ?? [];
  }

  messagesFor(productKey: string): string[] {
    return this.forProduct(productKey).map((d) => d.message);
  }

  /** Every diagnostic in append order. */
  all(): readonly Diagnostic[] {
    return this.entries;
  }

  get count(): number {
    return this.entries.length;
  }

  reset(): void {
    this.entries.length = 0;
    this.byProduct.clear();
  }
}
