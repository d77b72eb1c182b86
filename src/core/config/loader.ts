import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { CHECKS_ENV_VAR, defaultConcurrency, parseChecksList } from '../checks/registry.js';
import type { ChecksConfig } from '../checks/types.js';

const DEFAULT_CONFIG_PATH = '.attrlint.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * named file must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

export interface ChecksConfigOverrides {
  /** Extra excluded rules, e.g. from the command line */
  exclude?: readonly string[];
  /** Environment to read the installed-checks listing from */
  env?: NodeJS.ProcessEnv;
  /** Base for relative search-path entries */
  projectRoot?: string;
}

/**
 * Assemble the protocol's ChecksConfig. This is the one place the
 * environment listing of installed checks is read.
 */
export function toChecksConfig(config: Config, overrides: ChecksConfigOverrides = {}): ChecksConfig {
  const root = overrides.projectRoot ?? process.cwd();
  const fromEnv = parseChecksList(overrides.env?.[CHECKS_ENV_VAR]);

  return {
    names: [...config.checks.names, ...fromEnv],
    searchPath: config.checks.search_path.map((dir) => path.resolve(root, dir)),
    excluded: new Set([...config.exclude, ...(overrides.exclude ?? [])]),
    concurrency: config.checks.concurrency ?? defaultConcurrency(),
    ...(config.checks.timeout_ms !== undefined ? { timeoutMs: config.checks.timeout_ms } : {}),
  };
}
