/**
 * Attribute resolution: one batched evaluation for every requested path,
 * each classified into failed / not-found / resolved.
 */
import { fileExists } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { decodeDiagnostic, decodeLocation } from '../report/codec.js';
import { parsePosition } from '../report/location.js';
import { BuiltinDiagnostics, type AttributeDescriptor, type SourceLocation } from '../report/types.js';
import type { Evaluator } from './evaluator.js';
import { encodeEvalExpression } from './nix-expression.js';
import { buildEvalRequest, type Transformation } from './request.js';
import { decodeEvalResponse, type EvalEntry } from './response.js';
import { reportEvalErrorDiagnostic } from './diagnostics.js';
import type { ResolveOutcome, ResolveResult } from './types.js';

export interface ResolveOptions {
  packageSetPath: string;
  transformations?: readonly Transformation[];
  evaluator: Evaluator;
  /** Rule names that must not be reported */
  excluded?: ReadonlySet<string>;
  cwd?: string;
}

export async function resolveAttributes(
  attrPaths: readonly string[],
  options: ResolveOptions
): Promise<ResolveResult> {
  const request = buildEvalRequest({
    packageSetPath: options.packageSetPath,
    attrPaths,
    transformations: options.transformations,
    cwd: options.cwd,
  });
  const names = request.attributes.map((a) => a.name);
  if (names.length === 0) {
    return { outcomes: [], descriptors: [] };
  }

  logger.debug(`Resolving ${names.length} attribute(s) with ${request.transformations.length} transformation(s)`);
  const raw = await options.evaluator.evaluate(encodeEvalExpression(request));
  const entries = decodeEvalResponse(raw, names);

  const excluded = options.excluded ?? new Set<string>();
  const outcomes = await Promise.all(
    entries.map(([name, entry]) => classify(name, entry, options.packageSetPath, excluded))
  );

  return { outcomes, descriptors: outcomes.map((o) => o.descriptor) };
}

/**
 * Turn one evaluator entry into an outcome. The artifact path is kept only
 * if it exists right now.
 */
export async function classify(
  name: string,
  entry: EvalEntry,
  packageSet: string,
  excluded: ReadonlySet<string> = new Set()
): Promise<ResolveOutcome> {
  switch (entry.status) {
    case 'failed':
      return { kind: 'failed', descriptor: { name }, packageSet };
    case 'not-found':
      return { kind: 'not-found', descriptor: { name }, packageSet };
    case 'resolved':
      break;
  }

  const diagnostics = entry.reportEvaluated
    ? entry.report.map(decodeDiagnostic)
    : excluded.has(BuiltinDiagnostics.REPORT_EVAL_ERROR)
      ? []
      : [reportEvalErrorDiagnostic(name)];

  const location = entryLocation(entry.location);
  const artifactPath = entry.outputPath !== null && await fileExists(entry.outputPath)
    ? entry.outputPath
    : undefined;

  const descriptor: AttributeDescriptor = {
    name,
    ...(location ? { location } : {}),
    ...(entry.drvPath !== null ? { buildPlanPath: entry.drvPath } : {}),
    ...(artifactPath !== undefined ? { artifactPath } : {}),
  };

  return { kind: 'resolved', descriptor, diagnostics };
}

function entryLocation(location: EvalEntry['location']): SourceLocation | undefined {
  if (location === null) return undefined;
  if (typeof location === 'string') return parsePosition(location);
  return decodeLocation(location);
}
