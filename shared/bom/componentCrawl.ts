import type { Catalogue, ComponentRef, Product } from "./catalogue";
import { unresolvedComponentDiagnostic, type DiagnosticLog } from "./diagnostics";
import { BomCycleError, InvalidTraversalStateError, UnknownProductError } from "./errors";

// ------------------------------------------------------------
// Depth-first crawl of a product's component expansion.
// All crawl state lives in the context; nothing is module-level,
// so two crawls over one catalogue never share state.
// ------------------------------------------------------------

type CrawlFrame = {
  product: Product;
  /** Level of this product below the root (root = 0). */
  level: number;
  /** Units of this product needed per one unit of the root. */
  quantityPerTop: number;
  nextComponent: number;
};

export type CrawlContext = {
  readonly catalogue: Catalogue;
  readonly root: Product;
  readonly diagnostics: DiagnosticLog;
  readonly frames: CrawlFrame[];
};

export type CrawlEdge =
  | {
      resolved: true;
      parent: Product;
      ref: ComponentRef;
      child: Product;
      /** Level of the child below the root; the root's direct components are level 1. */
      level: number;
      quantityPerTop: number;
    }
  | {
      resolved: false;
      parent: Product;
      ref: ComponentRef;
      level: number;
    };

export type CrawlVisitor = (edge: CrawlEdge) => void;

export function openCrawl(catalogue: Catalogue, rootKey: string, diagnostics: DiagnosticLog): CrawlContext {
  const root = catalogue.get(rootKey);
  if (!root) throw new UnknownProductError(rootKey);

  return {
    catalogue,
    root,
    diagnostics,
    frames: [{ product: root, level: 0, quantityPerTop: 1, nextComponent: 0 }],
  };
}

/**
 * Advance the crawl by one ComponentRef of the innermost open product (or close
 * that product when its list is exhausted). Returns false once the root closes.
 *
 * @throws InvalidTraversalStateError when the context has no open frame
 * @throws BomCycleError when a component is already on the current path
 */
export function stepCrawl(ctx: CrawlContext, visit: CrawlVisitor): boolean {
  const frame = ctx.frames[ctx.frames.length - 1];
  if (!frame) {
    throw new InvalidTraversalStateError(
      `Crawl step for product ${ctx.root.key} called without an open crawl; start it with openCrawl or runCrawl`
    );
  }

  const { product } = frame;
  if (frame.nextComponent >= product.components.length) {
    ctx.frames.pop();
    return ctx.frames.length > 0;
  }

  const ref = product.components[frame.nextComponent];
  frame.nextComponent += 1;
  const level = frame.level + 1;

  const child = ctx.catalogue.get(ref.componentKey);
  if (!child) {
    ctx.diagnostics.append(unresolvedComponentDiagnostic(product.key, ref.componentKey));
    visit({ resolved: false, parent: product, ref, level });
    return true;
  }

  if (ctx.frames.some((f) => f.product.key === child.key)) {
    throw new BomCycleError([...ctx.frames.map((f) => f.product.key), child.key]);
  }

  const quantityPerTop = frame.quantityPerTop * ref.quantityPer;
  visit({ resolved: true, parent: product, ref, child, level, quantityPerTop });
  ctx.frames.push({ product: child, level, quantityPerTop, nextComponent: 0 });
  return true;
}

export function runCrawl(
  catalogue: Catalogue,
  rootKey: string,
  diagnostics: DiagnosticLog,
  visit: CrawlVisitor
): CrawlContext {
  const ctx = openCrawl(catalogue, rootKey, diagnostics);
  let open = true;
  while (open) {
    open = stepCrawl(ctx, visit);
  }
  return ctx;
}
