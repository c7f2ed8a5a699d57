import { describe, expect, test } from "@jest/globals";
import { openCrawl, runCrawl, stepCrawl, type CrawlEdge } from "@shared/bom/componentCrawl";
import { DiagnosticLog } from "@shared/bom/diagnostics";
import { InvalidTraversalStateError, UnknownProductError } from "@shared/bom/errors";
import { catalogueOf } from "./bomTestRows";

const TREE = catalogueOf([
  ["1", "2", 2],
  ["1", "4", 1],
  ["2", "3", 5],
  ["3", null, null],
  ["4", "8", 1],
]);

function describeEdge(edge: CrawlEdge): string {
  return edge.resolved
    ? `${edge.parent.key}>${edge.child.key}@${edge.level}x${edge.quantityPerTop}`
    : `${edge.parent.key}>?${edge.ref.componentKey}@${edge.level}`;
}

describe("component crawl", () => {
  test("visits references depth-first in list order", () => {
    const seen: string[] = [];
    runCrawl(TREE, "1", new DiagnosticLog(), (edge) => seen.push(describeEdge(edge)));

    expect(seen).toEqual(["1>2@1x2", "2>3@2x10", "1>4@1x1", "4>?8@2"]);
  });

  test("steps one reference at a time until the root closes", () => {
    const ctx = openCrawl(TREE, "2", new DiagnosticLog());
    const seen: string[] = [];

    expect(stepCrawl(ctx, (edge) => seen.push(describeEdge(edge)))).toBe(true);
    expect(seen).toEqual(["2>3@1x5"]);
    // closes 3, then closes the root
    expect(stepCrawl(ctx, () => undefined)).toBe(true);
    expect(stepCrawl(ctx, () => undefined)).toBe(false);
  });

  test("a step on a finished crawl raises an invalid state error", () => {
    const ctx = runCrawl(TREE, "3", new DiagnosticLog(), () => undefined);
    expect(() => stepCrawl(ctx, () => undefined)).toThrow(InvalidTraversalStateError);
  });

  test("a step on a context that was never opened raises an invalid state error", () => {
    const opened = openCrawl(TREE, "1", new DiagnosticLog());
    const ctx = { ...opened, frames: [] };

    expect(() => stepCrawl(ctx, () => undefined)).toThrow(
      "Crawl step for product 1 called without an open crawl; start it with openCrawl or runCrawl"
    );
  });

  test("an unknown root cannot be opened", () => {
    expect(() => openCrawl(TREE, "404", new DiagnosticLog())).toThrow("Product 404 is not defined in the catalogue");
    expect(() => openCrawl(TREE, "404", new DiagnosticLog())).toThrow(UnknownProductError);
  });

  test("interleaved crawls over one catalogue do not share state", () => {
    const a = openCrawl(TREE, "1", new DiagnosticLog());
    const b = openCrawl(TREE, "2", new DiagnosticLog());
    const seenA: string[] = [];
    const seenB: string[] = [];

    let openA = true;
    let openB = true;
    while (openA || openB) {
      if (openA) openA = stepCrawl(a, (edge) => seenA.push(describeEdge(edge)));
      if (openB) openB = stepCrawl(b, (edge) => seenB.push(describeEdge(edge)));
    }

    expect(seenA).toEqual(["1>2@1x2", "2>3@2x10", "1>4@1x1", "4>?8@2"]);
    expect(seenB).toEqual(["2>3@1x5"]);
  });

  test("unresolved references are logged against their owner", () => {
    const diagnostics = new DiagnosticLog();
    runCrawl(TREE, "1", diagnostics, () => undefined);

    expect(diagnostics.messagesFor("4")).toEqual([
      "Product 4 refers to product 8 for which there is no definition in the source data.",
    ]);
    expect(diagnostics.count).toBe(1);
  });
});
