/**
 * Encoder turning an EvalRequest into the single expression handed to the
 * evaluator.
 *
 * Every value from the request is spliced in through `nixString`, never
 * concatenated raw. The expression yields one entry per attribute:
 *
 *   { status; report; reportEvaluated; location; outputPath; drvPath; }
 *
 * `status` separates a lookup that threw (`failed`) from one that found
 * nothing (`not-found`). Embedded reports get a second `tryEval` of their
 * own so a broken self-check only costs that attribute its reports.
 */
import type { EvalRequest } from './request.js';

/** Attribute on each derivation where transformations collect reports. */
export const REPORTS_ATTR = '__attrlintReports';

/**
 * Quote a string as a Nix string literal.
 */
export function nixString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$\{/g, '\\${')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

export function nixList(items: readonly string[]): string {
  return items.length === 0 ? '[ ]' : `[ ${items.join(' ')} ]`;
}

export function encodeEvalExpression(request: EvalRequest): string {
  const overlays = nixList(request.transformations.map((t) => nixString(t.path)));
  const reportsAttr = nixString(REPORTS_ATTR);

  const entries = request.attributes.map((attr) => {
    const segments = nixList(attr.segments.map(nixString));
    return `  ${nixString(attr.name)} = resolve ${segments};`;
  });

  return [
    'let',
    `  pkgs = import ${nixString(request.packageSetPath)} {`,
    `    overlays = map import ${overlays};`,
    '  };',
    '  lib = pkgs.lib;',
    '  orNull = value: let attempt = builtins.tryEval value; in if attempt.success then attempt.value else null;',
    '  unresolved = status: { inherit status; report = [ ]; location = null; outputPath = null; drvPath = null; };',
    '  reportsOf = drv:',
    `    let reports = builtins.filter (report: report.cond or true) (drv.\${${reportsAttr}} or [ ]);`,
    '    in builtins.tryEval (builtins.deepSeq reports reports);',
    '  resolve = path:',
    '    let attempt = builtins.tryEval (lib.attrByPath path null pkgs);',
    '    in',
    '      if !attempt.success then unresolved "failed"',
    '      else if attempt.value == null then unresolved "not-found"',
    '      else',
    '        let',
    '          drv = attempt.value;',
    '          reports = reportsOf drv;',
    '        in {',
    '          status = "resolved";',
    '          report = if reports.success then map (report: builtins.removeAttrs report [ "cond" ]) reports.value else [ ];',
    '          reportEvaluated = reports.success;',
    '          location = orNull (drv.meta.position or null);',
    '          outputPath = orNull (drv.outPath or null);',
    '          drvPath = orNull (drv.drvPath or null);',
    '        };',
    'in {',
    ...entries,
    '}',
    '',
  ].join('\n');
}
