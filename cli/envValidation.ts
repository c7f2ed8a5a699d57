/**
 * Environment Variable Validation
 *
 * Purpose: fail fast before any analysis runs with settings that would change
 * the numbers or the shape of the report.
 *
 * Tier 1 (FATAL): values that alter results or output format - the run stops
 * Tier 2 (NON-FATAL): cosmetic settings - warns and falls back to defaults
 */

import { isLogLevel, logger, LOG_LEVELS } from "./logger";

export type EnvSource = Record<string, string | undefined>;

interface EnvCheck {
  name: string;
  tier: 1 | 2; // 1 = FATAL, 2 = NON-FATAL
  validator: (value: string | undefined) => string | null; // error message or null if valid
}

export const REPORT_MODES = ["concise", "verbose"] as const;
export const REPORT_FORMATS = ["text", "csv"] as const;

function oneOf(name: string, allowed: readonly string[]) {
  return (value: string | undefined): string | null => {
    if (value === undefined || value.trim() === "") return null;
    if (allowed.includes(value.trim().toLowerCase())) return null;
    return `${name}="${value}" is not recognized. Valid values: ${allowed.map((a) => `"${a}"`).join(", ")}`;
  };
}

// Tier 1: FATAL
const TIER1_CHECKS: EnvCheck[] = [
  {
    name: "BOM_REPORT_MODE",
    tier: 1,
    validator: oneOf("BOM_REPORT_MODE", REPORT_MODES),
  },
  {
    name: "BOM_REPORT_FORMAT",
    tier: 1,
    validator: oneOf("BOM_REPORT_FORMAT", REPORT_FORMATS),
  },
  {
    name: "BOM_CSV_DELIMITER",
    tier: 1,
    validator: (value) => {
      if (value === undefined || value === "") return null;
      const delimiter = value === "\\t" ? "\t" : value;
      if (delimiter.length !== 1) return "BOM_CSV_DELIMITER must be a single character (use \\t for tab)";
      if (/[0-9."\r\n]/.test(delimiter)) return `BOM_CSV_DELIMITER cannot be "${value}": it clashes with numeric or quoted cells`;
      return null;
    },
  },
];

// Tier 2: NON-FATAL
const TIER2_CHECKS: EnvCheck[] = [
  {
    name: "LOG_LEVEL",
    tier: 2,
    validator: (value) => {
      if (value === undefined || value.trim() === "") return null;
      if (isLogLevel(value.trim().toLowerCase())) return null;
      return `LOG_LEVEL="${value}" is not recognized (valid: ${LOG_LEVELS.join(", ")}); using the default level`;
    },
  },
  {
    name: "BOM_INPUT_FILE",
    tier: 2,
    validator: (value) => {
      if (value !== undefined && value.trim() === "") {
        return "BOM_INPUT_FILE is set but empty; pass --input instead";
      }
      return null;
    },
  },
];

export interface ValidationResult {
  valid: boolean;
  tier1Errors: Array<{ var: string; message: string }>;
  tier2Warnings: Array<{ var: string; message: string }>;
}

export function validateEnvironment(env: EnvSource = process.env): ValidationResult {
  const tier1Errors: Array<{ var: string; message: string }> = [];
  const tier2Warnings: Array<{ var: string; message: string }> = [];

  for (const check of TIER1_CHECKS) {
    const validationError = check.validator(env[check.name]);
    if (validationError) tier1Errors.push({ var: check.name, message: validationError });
  }

  for (const check of TIER2_CHECKS) {
    const validationError = check.validator(env[check.name]);
    if (validationError) tier2Warnings.push({ var: check.name, message: validationError });
  }

  return {
    valid: tier1Errors.length === 0,
    tier1Errors,
    tier2Warnings,
  };
}

/**
 * Log the outcome of validateEnvironment. Returns false when a tier 1 check
 * failed and the run must stop.
 */
export function reportEnvironmentValidation(result: ValidationResult): boolean {
  for (const warning of result.tier2Warnings) {
    logger.warn(`${warning.var}: ${warning.message}`, { tier: 2 });
  }

  for (const error of result.tier1Errors) {
    logger.error(`${error.var}: ${error.message}`, { tier: 1 });
  }

  if (!result.valid) {
    logger.error("Configuration is invalid; fix the TIER 1 errors above and re-run");
  }

  return result.valid;
}
