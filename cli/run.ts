import fs from "fs";
import { BomAnalysisError } from "../shared/bom/errors";
import { resolveConfig, USAGE, type BomAnalysisConfig } from "./config";
import { reportEnvironmentValidation, validateEnvironment, type EnvSource } from "./envValidation";
import { analyseBom } from "./lib/bomAnalysis";
import { readBomCsvFile } from "./lib/bomCsvIngestion";
import { renderCsvReport, renderTextReport } from "./lib/bomReport";
import { logError, logger } from "./logger";

export const EXIT_OK = 0;
export const EXIT_ANALYSIS_FAILED = 1;
export const EXIT_USAGE = 2;

export type CliIo = {
  /** Receives the rendered report when no --out file is given. */
  stdout: (text: string) => void;
  writeFile: (path: string, text: string) => void;
};

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  writeFile: (path, text) => fs.writeFileSync(path, text, "utf8"),
};

export function renderReport(config: BomAnalysisConfig): string {
  const { rows, issues } = readBomCsvFile(config.inputFile, { delimiter: config.delimiter });
  const analysis = analyseBom(rows, issues);

  return config.reportFormat === "csv"
    ? renderCsvReport(analysis)
    : renderTextReport(analysis, { mode: config.reportMode, listComponents: config.listComponents });
}

/**
 * Run one analysis and return the process exit code. A fatal error writes no
 * report at all.
 */
export function runCli(argv: readonly string[], env: EnvSource = process.env, io: CliIo = defaultIo): number {
  if (argv.includes("--help") || argv.includes("-h")) {
    io.stdout(USAGE + "\n");
    return EXIT_OK;
  }

  if (!reportEnvironmentValidation(validateEnvironment(env))) return EXIT_USAGE;

  const resolved = resolveConfig(argv, env);
  if (!resolved.ok) {
    for (const message of resolved.errors) logger.error(message);
    logger.error(USAGE);
    return EXIT_USAGE;
  }

  const { config } = resolved;
  const log = logger.child({ inputFile: config.inputFile });

  let report: string;
  try {
    report = renderReport(config);
  } catch (error) {
    if (error instanceof BomAnalysisError) {
      logError(error, { inputFile: config.inputFile });
      return EXIT_ANALYSIS_FAILED;
    }
    throw error;
  }

  if (config.outFile) {
    io.writeFile(config.outFile, report);
    log.info("Report written", { outFile: config.outFile, format: config.reportFormat });
  } else {
    io.stdout(report);
  }
  return EXIT_OK;
}
