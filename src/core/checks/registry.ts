import * as os from 'node:os';
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import type { ChecksConfig } from './types.js';

/** Environment variable listing installed checks, `:`-separated. */
export const CHECKS_ENV_VAR = 'ATTRLINT_CHECKS';

/**
 * Plugin names from an environment listing. Blank entries are ignored.
 */
export function parseChecksList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(':')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Default worker limit: 75% of available CPUs, min 2, max 16.
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Registration order: unique names, excluded ones dropped, sorted
 * lexicographically.
 */
export function registeredChecks(config: Pick<ChecksConfig, 'names' | 'excluded'>): string[] {
  const names = new Set(config.names.filter((name) => !config.excluded.has(name)));
  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * First `<dir>/<name>` on the search path that exists; otherwise the bare
 * name, left for the OS to find on PATH.
 */
export async function resolveExecutable(name: string, searchPath: readonly string[]): Promise<string> {
  for (const dir of searchPath) {
    const candidate = path.join(dir, name);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return name;
}
