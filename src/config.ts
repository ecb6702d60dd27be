/**
 * Runtime configuration
 *
 * Resolves estimator options against environment defaults:
 *   - PASSWORD_MAX_LENGTH: Longest password accepted (positive integer, default 72)
 *   - PASSWORD_LANGUAGE: Feedback language tag (default "en")
 *   - CRACKSCORE_DATA_DIR: Directory holding frequency_lists/ and locales/ (default "data")
 */

import type { EstimatorConfig, EstimatorOptions } from "@/types";
import {
  DATA_DIR,
  DATA_DIR_ENV,
  DEFAULT_LANGUAGE,
  DEFAULT_MAX_LENGTH,
  LANGUAGE_ENV,
  MAX_LENGTH_ENV,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Parses a positive integer setting, falling back to `fallback` with a
 * warning when the value is malformed.
 *
 * @example
 * parsePositiveInt("128", 72, "PASSWORD_MAX_LENGTH") // 128
 * parsePositiveInt("abc", 72, "PASSWORD_MAX_LENGTH") // 72 (logs a warning)
 * parsePositiveInt(undefined, 72, "PASSWORD_MAX_LENGTH") // 72
 */
export function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  name: string,
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    logger.warn("Invalid numeric setting, using default", {
      name,
      value,
      default: fallback,
    });
    return fallback;
  }
  return parsed;
}

/**
 * Merges explicit options over environment defaults.
 */
export function resolveConfig(
  options: EstimatorOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): EstimatorConfig {
  return {
    language: options.language ?? env[LANGUAGE_ENV] ?? DEFAULT_LANGUAGE,
    maxLength:
      options.maxLength ??
      parsePositiveInt(env[MAX_LENGTH_ENV], DEFAULT_MAX_LENGTH, MAX_LENGTH_ENV),
    dataDir: options.dataDir ?? env[DATA_DIR_ENV] ?? DATA_DIR,
  };
}
