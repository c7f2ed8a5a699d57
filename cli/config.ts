import { z } from "zod";
import { REPORT_FORMATS, REPORT_MODES, type EnvSource } from "./envValidation";

export const bomAnalysisConfigSchema = z.object({
  inputFile: z.string().trim().min(1, "An input file is required (--input <file> or BOM_INPUT_FILE)"),
  reportMode: z.enum(REPORT_MODES),
  reportFormat: z.enum(REPORT_FORMATS),
  listComponents: z.boolean(),
  outFile: z.string().trim().min(1).nullable(),
  delimiter: z.string().length(1, "The CSV delimiter must be a single character"),
});

export type BomAnalysisConfig = z.infer<typeof bomAnalysisConfigSchema>;

export type ConfigResult =
  | { ok: true; config: BomAnalysisConfig }
  | { ok: false; errors: string[] };

export const USAGE = [
  "Usage:",
  "  bom-rollup --input <file.csv> [--verbose] [--format text|csv] [--list-components] [--out <file>] [--delimiter <char>]",
  "",
  "Environment (flags take precedence):",
  "  BOM_INPUT_FILE, BOM_REPORT_MODE=concise|verbose, BOM_REPORT_FORMAT=text|csv, BOM_CSV_DELIMITER, LOG_LEVEL",
].join("\n");

function argValue(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function hasFlag(argv: readonly string[], flag: string): boolean {
  return argv.includes(flag);
}

function unescapeDelimiter(value: string): string {
  return value === "\\t" ? "\t" : value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Merge command line flags over environment variables and validate the result.
 * `argv` is the argument list after the script name.
 */
export function resolveConfig(argv: readonly string[], env: EnvSource = process.env): ConfigResult {
  const errors: string[] = [];

  for (const flag of ["--input", "--format", "--out", "--delimiter"]) {
    if (hasFlag(argv, flag)) {
      const value = argValue(argv, flag);
      if (value === undefined || value.startsWith("--")) errors.push(`${flag} requires a value`);
    }
  }

  const modeFromEnv = nonEmpty(env.BOM_REPORT_MODE)?.trim().toLowerCase();
  const formatFromFlag = argValue(argv, "--format");
  const formatFromEnv = nonEmpty(env.BOM_REPORT_FORMAT)?.trim().toLowerCase();
  const delimiter = argValue(argv, "--delimiter") ?? nonEmpty(env.BOM_CSV_DELIMITER) ?? ",";

  const candidate = {
    inputFile: argValue(argv, "--input") ?? nonEmpty(env.BOM_INPUT_FILE) ?? "",
    reportMode: hasFlag(argv, "--verbose") ? "verbose" : modeFromEnv ?? "concise",
    reportFormat: formatFromFlag?.trim().toLowerCase() ?? formatFromEnv ?? "text",
    listComponents: hasFlag(argv, "--list-components"),
    outFile: argValue(argv, "--out") ?? null,
    delimiter: unescapeDelimiter(delimiter),
  };

  if (errors.length > 0) return { ok: false, errors };

  const parsed = bomAnalysisConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
    };
  }

  return { ok: true, config: parsed.data };
}
