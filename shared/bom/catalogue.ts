import { bomRowSchema, parseReplenishmentSystem, type BomRow, type ReplenishmentSystem } from "./bomRow";
import { DiagnosticLog, warningDiagnostic } from "./diagnostics";
import { BomIngestionError } from "./errors";
import { normalizeProductId, productKey, type ProductId } from "./productId";

export type ComponentRef = {
  readonly componentId: ProductId;
  readonly componentKey: string;
  /** Units of the component consumed per one unit of the owning product. */
  readonly quantityPer: number;
};

export type Product = {
  readonly id: ProductId;
  readonly key: string;
  readonly replenishmentSystem: ReplenishmentSystem;
  readonly unitCost: number;
  readonly components: readonly ComponentRef[];
};

/**
 * Product map keyed by canonical product key. Iteration follows the order in
 * which products first appeared in the source rows. Frozen once built.
 */
export class Catalogue implements Iterable<Product> {
  private readonly products: ReadonlyMap<string, Product>;

  constructor(products: Iterable<Product>) {
    const map = new Map<string, Product>();
    for (const p of products) {
      if (map.has(p.key)) {
        throw new BomIngestionError(`Duplicate product key ${p.key} in catalogue`);
      }
      map.set(p.key, Object.freeze({ ...p, components: Object.freeze([...p.components]) }));
    }
    this.products = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.products.size;
  }

  has(key: string): boolean {
    return this.products.has(key);
  }

  get(key: string): Product | undefined {
    return this.products.get(key);
  }

  keys(): string[] {
    return Array.from(this.products.keys());
  }

  [Symbol.iterator](): Iterator<Product> {
    return this.products.values();
  }
}

export type CatalogueBuildResult = {
  catalogue: Catalogue;
  diagnostics: DiagnosticLog;
};

type ProductDraft = {
  id: ProductId;
  key: string;
  replenishmentSystem: ReplenishmentSystem;
  unitCost: number;
  components: ComponentRef[];
};

export function buildCatalogue(rows: readonly BomRow[]): CatalogueBuildResult {
  const diagnostics = new DiagnosticLog();
  const drafts = new Map<string, ProductDraft>();

  for (const input of rows) {
    const parsed = bomRowSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; ");
      throw new BomIngestionError(`Invalid BOM row ${input.rowIndex}: ${detail}`, input.rowIndex);
    }
    const row = parsed.data;

    const id = normalizeProductId(row.productId);
    const key = productKey(id);

    let draft = drafts.get(key);
    if (!draft) {
      draft = {
        id,
        key,
        replenishmentSystem: parseReplenishmentSystem(row.replenishmentSystem),
        unitCost: row.unitCost,
        components: [],
      };
      drafts.set(key, draft);
    }

    if (id.kind === "invalid") {
      diagnostics.append(
        warningDiagnostic({
          code: "BOM_INVALID_ITEM_NO",
          message: `Non-numeric Item No. detected in raw data, value read was: ${id.raw ?? ""} on row ${row.rowIndex}`,
          productKey: key,
          context: { rowIndex: row.rowIndex, raw: id.raw },
        })
      );
    }

    const rawComponent = row.componentId === null ? "" : row.componentId.trim();
    if (!rawComponent) continue;

    const componentId = normalizeProductId(rawComponent);
    if (componentId.kind === "invalid") {
      diagnostics.append(
        warningDiagnostic({
          code: "BOM_INVALID_COMPONENT_NO",
          message: `Product ${key} refers to non-numeric component No. ${rawComponent} on row ${row.rowIndex}; the component was skipped.`,
          productKey: key,
          context: { rowIndex: row.rowIndex, raw: rawComponent },
        })
      );
      continue;
    }

    // The schema guarantees a quantity whenever a component is present.
    const quantityPer = row.quantityPer;
    if (quantityPer === null) continue;

    const componentKey = productKey(componentId);
    if (draft.components.some((c) => c.componentKey === componentKey)) {
      diagnostics.append(
        warningDiagnostic({
          code: "BOM_DUPLICATE_COMPONENT",
          message: `Product ${key} refers to component product ${componentKey} more than once.`,
          productKey: key,
          context: { componentKey, rowIndex: row.rowIndex },
        })
      );
    }

    draft.components.push({ componentId, componentKey, quantityPer });
  }

  return { catalogue: new Catalogue(drafts.values()), diagnostics };
}
