// Config loader: reads a YAML file and deep-merges it over DEFAULT_CONFIG.
// Users override only the keys they specify; arrays replace rather than merge.
// The merged result is validated with configSchema before anything uses it.
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { configSchema, DEFAULT_CONFIG, type OracleConfig } from './schema.js';
import { OracleError, OracleErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_FILE = 'regression-oracle.yaml';

export interface ConfigResult {
  config: OracleConfig;
  configPath: string;
  fromFile: boolean;
}

export function resolveConfigPath(explicitPath?: string): string {
  return explicitPath ?? process.env['ORACLE_CONFIG'] ?? path.resolve(DEFAULT_CONFIG_FILE);
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = resolveConfigPath(explicitPath);

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'no config file found, using defaults');
    return { config: structuredClone(DEFAULT_CONFIG), configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new OracleError(OracleErrorCode.CONFIG_INVALID, `Failed to parse config: ${configPath}`, {
      cause: describeError(err),
    });
  }

  return { config: mergeConfig(parsed ?? {}), configPath, fromFile: true };
}

/** Merges a partial config object over the defaults and validates the result. */
export function mergeConfig(overrides: unknown): OracleConfig {
  if (!isPlainObject(overrides)) {
    throw new OracleError(OracleErrorCode.CONFIG_INVALID, 'Config root must be a mapping');
  }
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), overrides);
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new OracleError(OracleErrorCode.CONFIG_INVALID, `Invalid config: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
