/**
 * Schema of `.attrlint.yaml`.
 */
import { z } from 'zod';

/**
 * Make an object field optional and fill in its inner defaults when it is
 * missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_DOCS_URL = 'https://github.com/jtojnar/nixpkgs-hammering/blob/master/explanations';

/** How the build-description evaluator is invoked. */
export const EvaluatorSettingsSchema = z.object({
  command: z.string().min(1).default('nix-instantiate'),
  show_trace: z.boolean().default(false),
});

/** Installed check plugins. */
export const ChecksSettingsSchema = z.object({
  /** Plugin names; merged with the ATTRLINT_CHECKS listing */
  names: z.array(z.string().min(1)).default([]),
  /** Directories searched for plugin executables before PATH */
  search_path: z.array(z.string()).default([]),
  /** Plugins running at once (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Per-plugin timeout; expiry aborts the run */
  timeout_ms: z.number().int().positive().optional(),
});

export const ConfigSchema = z.object({
  /** Package set to import */
  package_set: z.string().min(1).default('.'),
  /** Directory of `<rule>.nix` transformations */
  overlays_dir: z.string().min(1).default('overlays'),
  /** Rule names never reported */
  exclude: z.array(z.string().min(1)).default([]),
  /** Base URL of the per-rule explanations */
  docs_url: z.string().url().default(DEFAULT_DOCS_URL),
  evaluator: withDefaults(EvaluatorSettingsSchema),
  checks: withDefaults(ChecksSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
