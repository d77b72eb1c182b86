/**
 * Merging of diagnostic bundles.
 *
 * Lists are concatenated in argument order and keys keep the order they
 * first appear in. Nothing is deduplicated or re-sorted, so merged output
 * always reads in the order the sources ran.
 */
import type { Diagnostic, DiagnosticBundle } from '../report/types.js';
import { attrPathNotFoundDiagnostic, evalErrorDiagnostic } from '../resolver/diagnostics.js';
import type { ResolveOutcome } from '../resolver/types.js';

export function mergeBundles(...bundles: readonly DiagnosticBundle[]): DiagnosticBundle {
  const merged: DiagnosticBundle = new Map();
  for (const bundle of bundles) {
    for (const [attr, diagnostics] of bundle) {
      const existing = merged.get(attr);
      if (existing) {
        existing.push(...diagnostics);
      } else {
        merged.set(attr, [...diagnostics]);
      }
    }
  }
  return merged;
}

/**
 * Resolver diagnostics for one outcome.
 */
export function outcomeDiagnostics(outcome: ResolveOutcome): Diagnostic[] {
  switch (outcome.kind) {
    case 'failed':
      return [evalErrorDiagnostic(outcome.descriptor.name, outcome.packageSet)];
    case 'not-found':
      return [attrPathNotFoundDiagnostic(outcome.descriptor.name, outcome.packageSet)];
    case 'resolved':
      return [...outcome.diagnostics];
    default:
      return assertNever(outcome);
  }
}

/**
 * The resolver's bundle: one key per outcome, in outcome order.
 */
export function bundleFromOutcomes(outcomes: readonly ResolveOutcome[]): DiagnosticBundle {
  const bundle: DiagnosticBundle = new Map();
  for (const outcome of outcomes) {
    bundle.set(outcome.descriptor.name, outcomeDiagnostics(outcome));
  }
  return bundle;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled resolve outcome: ${JSON.stringify(value)}`);
}
