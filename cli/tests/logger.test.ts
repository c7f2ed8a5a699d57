import { afterEach, describe, expect, jest, test } from "@jest/globals";
import { BomCycleError } from "@shared/bom/errors";
import { logError, logger } from "../logger";

function captureStderr(run: () => void): string[] {
  const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  try {
    run();
    return spy.mock.calls.map((args) => String(args[0]));
  } finally {
    spy.mockRestore();
  }
}

describe("logger", () => {
  const originalNodeEnv = process.env.NODE_ENV ?? "test";
  const originalLogLevel = process.env.LOG_LEVEL ?? "error";

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
    process.env.LOG_LEVEL = originalLogLevel;
  });

  test("drops entries below the configured level", () => {
    process.env.LOG_LEVEL = "warn";
    const lines = captureStderr(() => {
      logger.info("not shown");
      logger.warn("shown");
    });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[.+\] WARN shown$/);
  });

  test("writes JSON in production and merges child context", () => {
    process.env.NODE_ENV = "production";
    process.env.LOG_LEVEL = "info";
    const lines = captureStderr(() => logger.child({ inputFile: "bom.csv" }).info("Catalogue built", { products: 3 }));

    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: "info", msg: "Catalogue built", inputFile: "bom.csv", products: 3 });
    expect(typeof entry.timestamp).toBe("string");
  });

  test("logError carries the error code", () => {
    process.env.NODE_ENV = "production";
    process.env.LOG_LEVEL = "error";
    const lines = captureStderr(() => logError(new BomCycleError(["1", "2", "1"]), { inputFile: "bom.csv" }));

    expect(JSON.parse(lines[0])).toMatchObject({
      level: "error",
      msg: "Component cycle detected: 1 -> 2 -> 1",
      code: "BOM_E_CYCLE",
      inputFile: "bom.csv",
      error: { name: "BomCycleError", message: "Component cycle detected: 1 -> 2 -> 1" },
    });
  });
});
