import { describe, expect, test } from "@jest/globals";
import { computeRolledUpCost, computeRolledUpCosts } from "@shared/bom/costRollup";
import { DiagnosticLog } from "@shared/bom/diagnostics";
import { BomCycleError } from "@shared/bom/errors";
import { catalogueOf, MULTI_LEVEL } from "./bomTestRows";

describe("computeRolledUpCost", () => {
  test("weights a purchased component by its quantity per", () => {
    const catalogue = catalogueOf([
      ["1", "10", 2],
      ["10", null, null, "Purchase", 5],
    ]);

    const result = computeRolledUpCost(catalogue, "1", new DiagnosticLog());

    expect(result.totalCost).toBe(10);
    expect(result.quantityPerTop.get("10")).toBe(2);
    expect(result.quantityPerTop.get("1")).toBe(1);
  });

  test("multiplies quantities down the tree and crawls through manufactured items", () => {
    const result = computeRolledUpCost(catalogueOf(MULTI_LEVEL), "1", new DiagnosticLog());

    expect(result.totalCost).toBe(24);
    expect(result.quantityPerTop.get("12")).toBe(6);
    expect(result.lines).toEqual([
      {
        level: 1,
        parentKey: "1",
        componentKey: "11",
        quantityPer: 2,
        quantityPerTop: 2,
        replenishmentSystem: "ProdOrder",
        unitCost: 0,
        componentCost: 0,
      },
      {
        level: 2,
        parentKey: "11",
        componentKey: "12",
        quantityPer: 3,
        quantityPerTop: 6,
        replenishmentSystem: "Purchase",
        unitCost: 4,
        componentCost: 24,
      },
    ]);
  });

  test("ignores the unit cost of items that are not purchased", () => {
    const catalogue = catalogueOf([
      ["1", "11", 2],
      ["11", "12", 3, "Prod. Order", 100],
      ["12", null, null, "Purchase", 4],
    ]);
    expect(computeRolledUpCost(catalogue, "1", new DiagnosticLog()).totalCost).toBe(24);
  });

  test("counts both a purchased item and its own purchased components", () => {
    const catalogue = catalogueOf([
      ["1", "2", 2],
      ["2", "3", 4, "Purchase", 3],
      ["3", null, null, "Purchase", 0.5],
    ]);
    expect(computeRolledUpCost(catalogue, "1", new DiagnosticLog()).totalCost).toBe(10);
  });

  test("a product costed on its own yields 0 without purchased components", () => {
    const catalogue = catalogueOf([["7", null, null, "Purchase", 9]]);
    const result = computeRolledUpCost(catalogue, "7", new DiagnosticLog());

    expect(result.totalCost).toBe(0);
    expect(result.lines).toEqual([]);
    expect(result.quantityPerTop).toEqual(new Map([["7", 1]]));
  });

  test("skips unresolved components with a diagnostic", () => {
    const catalogue = catalogueOf([
      ["1", "99", 3],
      ["1", "10", 1],
      ["10", null, null, "Purchase", 2],
    ]);
    const diagnostics = new DiagnosticLog();

    const result = computeRolledUpCost(catalogue, "1", diagnostics);

    expect(result.totalCost).toBe(2);
    expect(result.lines.map((l) => l.componentKey)).toEqual(["10"]);
    expect(diagnostics.messagesFor("1")).toEqual([
      "Product 1 refers to product 99 for which there is no definition in the source data.",
    ]);
  });

  test("a component reached on two branches keeps the last branch's multiplier", () => {
    const catalogue = catalogueOf([
      ["1", "20", 2],
      ["1", "30", 5],
      ["20", "40", 3],
      ["30", "40", 1],
      ["40", null, null, "Purchase", 1],
    ]);

    const result = computeRolledUpCost(catalogue, "1", new DiagnosticLog());

    expect(result.lines.map((l) => [l.componentKey, l.quantityPerTop])).toEqual([
      ["20", 2],
      ["40", 6],
      ["30", 5],
      ["40", 5],
    ]);
    expect(result.totalCost).toBe(11);
    expect(result.quantityPerTop.get("40")).toBe(5);
  });

  test("fails fast on a cycle", () => {
    const catalogue = catalogueOf([
      ["1", "2", 1],
      ["2", "3", 1],
      ["3", "2", 1],
    ]);
    expect(() => computeRolledUpCost(catalogue, "1", new DiagnosticLog())).toThrow(
      "Component cycle detected: 1 -> 2 -> 3 -> 2"
    );
  });
});

describe("computeRolledUpCosts", () => {
  test("starts every product from a zero total", () => {
    const results = computeRolledUpCosts(catalogueOf(MULTI_LEVEL), new DiagnosticLog());

    expect(results.map((r) => [r.rootKey, r.totalCost])).toEqual([
      ["1", 24],
      ["11", 12],
      ["12", 0],
    ]);
    expect(results[1].quantityPerTop.get("12")).toBe(3);
  });

  test("gives identical totals on repeated runs", () => {
    const catalogue = catalogueOf(MULTI_LEVEL);
    const first = computeRolledUpCosts(catalogue, new DiagnosticLog()).map((r) => r.totalCost);
    const second = computeRolledUpCosts(catalogue, new DiagnosticLog()).map((r) => r.totalCost);
    expect(second).toEqual(first);
  });
});
