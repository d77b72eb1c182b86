/**
 * One lint run: resolve, built-in notices, plugins, merge.
 *
 * A fatal error anywhere rejects the whole run; no partial bundle is
 * returned.
 */
import { buildNoticeBundle } from './checks/notices.js';
import { runChecks } from './checks/protocol.js';
import type { ChecksConfig, PluginRunner } from './checks/types.js';
import { bundleFromOutcomes, mergeBundles } from './merge/merge.js';
import type { AttributeDescriptor, DiagnosticBundle } from './report/types.js';
import type { Evaluator } from './resolver/evaluator.js';
import type { Transformation } from './resolver/request.js';
import { resolveAttributes } from './resolver/resolver.js';
import type { ResolveOutcome } from './resolver/types.js';

export interface LintRequest {
  attrPaths: readonly string[];
  packageSetPath: string;
  transformations: readonly Transformation[];
  checks: ChecksConfig;
  cwd?: string;
}

export interface LintDependencies {
  evaluator: Evaluator;
  runner: PluginRunner;
}

export interface LintResult {
  bundle: DiagnosticBundle;
  descriptors: AttributeDescriptor[];
  outcomes: ResolveOutcome[];
}

export async function runLint(request: LintRequest, deps: LintDependencies): Promise<LintResult> {
  const { outcomes, descriptors } = await resolveAttributes(request.attrPaths, {
    packageSetPath: request.packageSetPath,
    transformations: request.transformations,
    evaluator: deps.evaluator,
    excluded: request.checks.excluded,
    cwd: request.cwd,
  });

  // Unresolved attributes have nothing to build; their synthetic error says enough.
  const resolved = outcomes.filter((o) => o.kind === 'resolved').map((o) => o.descriptor);
  const notices = buildNoticeBundle(resolved, request.checks.excluded);
  const contributions = await runChecks(descriptors, request.checks, deps.runner);

  const bundle = mergeBundles(
    bundleFromOutcomes(outcomes),
    notices,
    ...contributions.map((c) => c.bundle)
  );

  return { bundle, descriptors, outcomes };
}
