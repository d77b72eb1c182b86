/**
 * Structured evaluation request: everything the evaluator expression is
 * generated from.
 */
import * as path from 'node:path';

/**
 * A diagnostic-producing transformation layered onto the package set.
 */
export interface Transformation {
  /** Rule name; matches the names of the diagnostics it emits */
  name: string;
  /** Absolute path of the overlay file */
  path: string;
}

/**
 * One requested attribute: its display name and the segments it is
 * looked up by.
 */
export interface AttributeRequest {
  name: string;
  segments: string[];
}

export interface EvalRequest {
  /** Absolute path of the package set to import */
  packageSetPath: string;
  attributes: AttributeRequest[];
  transformations: Transformation[];
}

export interface EvalRequestInit {
  packageSetPath: string;
  attrPaths: readonly string[];
  transformations?: readonly Transformation[];
  /** Base for a relative package-set path (default: cwd) */
  cwd?: string;
}

/**
 * Split an attribute path on dots. Double-quoted segments may contain dots
 * (`haskellPackages."foo.bar"`); empty segments are dropped.
 */
export function splitAttrPath(attrPath: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < attrPath.length; i++) {
    const ch = attrPath[i];
    if (quoted && ch === '\\' && i + 1 < attrPath.length) {
      current += attrPath[++i];
    } else if (ch === '"') {
      quoted = !quoted;
    } else if (ch === '.' && !quoted) {
      if (current.length > 0) segments.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current.length > 0) segments.push(current);

  return segments;
}

/**
 * Build the request for one batched evaluation. Duplicate attribute paths
 * collapse onto their first occurrence.
 */
export function buildEvalRequest(init: EvalRequestInit): EvalRequest {
  const seen = new Set<string>();
  const attributes: AttributeRequest[] = [];
  for (const name of init.attrPaths) {
    if (seen.has(name)) continue;
    seen.add(name);
    attributes.push({ name, segments: splitAttrPath(name) });
  }

  return {
    packageSetPath: path.resolve(init.cwd ?? process.cwd(), init.packageSetPath),
    attributes,
    transformations: [...(init.transformations ?? [])],
  };
}
