/**
 * Project-level configuration management
 *
 * Reads .decision-log/config.yaml for the decision source and log level.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import { z } from 'zod/v4';
import { LOG_LEVELS, type LogLevel } from '../../../shared/ui/LogManager.js';
import { getErrorMessage } from '../../../shared/utils/index.js';
import { applyProjectConfigEnvOverrides, type ConfigEnv } from '../env/config-env-overrides.js';

export const CONFIG_DIR_NAME = '.decision-log';
export const CONFIG_FILE_NAME = 'config.yaml';

const ProjectConfigSchema = z.object({
  source: z.string().min(1).optional(),
  log_level: z.enum(LOG_LEVELS).optional(),
}).passthrough();

export interface ProjectConfig {
  /** Absolute path of the decision source file */
  source: string;
  logLevel: LogLevel;
}

/** Bundled five-record sample log, used when no source is configured */
export function getSampleDecisionsPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return resolve(here, '..', '..', '..', '..', 'data', 'sample-decisions.json');
}

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Get project config file path
 */
export function getProjectConfigPath(projectDir: string): string {
  return join(resolve(projectDir), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function readRawConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to parse ${configPath}: ${getErrorMessage(err)}`, { cause: err });
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Invalid ${configPath}: expected a mapping at the top level`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Load project configuration from .decision-log/config.yaml, then apply
 * DECISION_LOG_* environment overrides. A relative source resolves against
 * the project directory.
 */
export function loadProjectConfig(projectDir: string, env: ConfigEnv = process.env): ProjectConfig {
  const configPath = getProjectConfigPath(projectDir);
  const raw = readRawConfig(configPath);
  applyProjectConfigEnvOverrides(raw, env);

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map((segment) => String(segment)).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid project config (${configPath}): ${details}`);
  }

  const { source, log_level } = result.data;
  return {
    source: source === undefined
      ? getSampleDecisionsPath()
      : (isAbsolute(source) ? source : resolve(projectDir, source)),
    logLevel: log_level ?? DEFAULT_LOG_LEVEL,
  };
}
