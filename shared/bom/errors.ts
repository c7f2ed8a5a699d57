export type BomErrorCode =
  | "BOM_E_CYCLE"
  | "BOM_E_INVALID_TRAVERSAL_STATE"
  | "BOM_E_UNKNOWN_PRODUCT"
  | "BOM_E_INGESTION";

export class BomAnalysisError extends Error {
  readonly code: BomErrorCode;

  constructor(code: BomErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A product reaches itself through its own component expansion. */
export class BomCycleError extends BomAnalysisError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("BOM_E_CYCLE", `Component cycle detected: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class InvalidTraversalStateError extends BomAnalysisError {
  constructor(message: string) {
    super("BOM_E_INVALID_TRAVERSAL_STATE", message);
  }
}

export class UnknownProductError extends BomAnalysisError {
  readonly productKey: string;

  constructor(productKey: string) {
    super("BOM_E_UNKNOWN_PRODUCT", `Product ${productKey} is not defined in the catalogue`);
    this.productKey = productKey;
  }
}

export class BomIngestionError extends BomAnalysisError {
  readonly rowIndex?: number;

  constructor(message: string, rowIndex?: number) {
    super("BOM_E_INGESTION", message);
    this.rowIndex = rowIndex;
  }
}
