import type { DiagnosticBundle } from '../report/types.js';

/**
 * Everything the protocol needs to know about the installed checks.
 * Built once at the CLI/config boundary.
 */
export interface ChecksConfig {
  /** Plugin identifiers, in any order */
  names: readonly string[];
  /** Directories searched for `<name>` before falling back to PATH */
  searchPath: readonly string[];
  /** Rule names to skip, plugins and built-in notices alike */
  excluded: ReadonlySet<string>;
  /** Maximum plugins running at once */
  concurrency: number;
  /** Per-plugin timeout (ms); expiry is fatal */
  timeoutMs?: number;
}

export interface PluginRunOptions {
  timeoutMs?: number;
}

export interface PluginRunResult {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Launches one plugin with the encoded batch on stdin.
 * Rejects only when the executable cannot be started.
 */
export interface PluginRunner {
  run(executable: string, input: string, options: PluginRunOptions): Promise<PluginRunResult>;
}

/**
 * A plugin's contribution, tagged with its registration slot.
 */
export interface PluginContribution {
  plugin: string;
  bundle: DiagnosticBundle;
}
