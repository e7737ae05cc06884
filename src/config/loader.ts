// Config loader — reads ~/.config/samtools-dispatch/config.yaml and deep-merges it over defaults.
// A missing file is not an error: defaults apply. A file that fails to parse or validate is.
// Config shape lives in src/types/config.ts; keep ConfigSchema and DEFAULT_CONFIG in step with it.
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { DispatchConfig } from '../types/config.js';
import { DispatchError, DispatchErrorCode } from '../errors.js';
import { logger } from '../logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'samtools-dispatch', 'config.yaml');

export const DEFAULT_CONFIG: DispatchConfig = {
  samtools: { binary: 'samtools', cwd: null },
  diagnostics: { benign_prefixes: [], replace_defaults: false },
};

const ConfigSchema = z.object({
  samtools: z.object({
    binary: z.string().min(1),
    cwd: z.string().min(1).nullable(),
  }),
  diagnostics: z.object({
    benign_prefixes: z.array(z.string().min(1)),
    replace_defaults: z.boolean(),
  }),
});

export interface ConfigResult {
  config: DispatchConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env['SAMTOOLS_DISPATCH_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file found — using defaults');
    return { config: applyEnv(DEFAULT_CONFIG, env), configPath, fromFile: false };
  }

  const parsed = parseConfig(readFileSync(configPath, 'utf-8'), configPath);
  logger.debug({ configPath }, 'Configuration loaded');
  return { config: applyEnv(parsed, env), configPath, fromFile: true };
}

/** Parse YAML text into a validated config, with unset keys taken from the defaults. */
export function parseConfig(yamlText: string, source = '<inline>'): DispatchConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (e) {
    throw new DispatchError(
      DispatchErrorCode.INVALID_CONFIG,
      `Invalid YAML in ${source}: ${e instanceof Error ? e.message : String(e)}`,
      { path: source },
    );
  }

  if (raw !== null && raw !== undefined && !isRecord(raw)) {
    throw new DispatchError(DispatchErrorCode.INVALID_CONFIG, `Config in ${source} must be a mapping`, {
      path: source,
    });
  }

  const merged = deepMerge(DEFAULT_CONFIG, isRecord(raw) ? raw : {});
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new DispatchError(
      DispatchErrorCode.INVALID_CONFIG,
      `Invalid config in ${source}: ${issues.join('; ')}`,
      { path: source, issues },
    );
  }
  return result.data;
}

function applyEnv(config: DispatchConfig, env: NodeJS.ProcessEnv): DispatchConfig {
  const binary = env['SAMTOOLS_BINARY'];
  if (!binary) return config;
  return { ...config, samtools: { ...config.samtools, binary } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
