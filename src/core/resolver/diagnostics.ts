/**
 * Diagnostics the resolver synthesizes instead of failing.
 */
import { createDiagnostic } from '../report/diagnostic.js';
import { BuiltinDiagnostics, type Diagnostic } from '../report/types.js';

export function evalErrorDiagnostic(attr: string, packageSet: string): Diagnostic {
  return createDiagnostic({
    name: BuiltinDiagnostics.EVAL_ERROR,
    message: `Cannot evaluate attribute ‘${attr}’ in ‘${packageSet}’.`,
    severity: 'warning',
    hasDocumentationLink: false,
  });
}

export function attrPathNotFoundDiagnostic(attr: string, packageSet: string): Diagnostic {
  return createDiagnostic({
    name: BuiltinDiagnostics.ATTR_PATH_NOT_FOUND,
    message: `Packages in ‘${packageSet}’ do not contain ‘${attr}’ attribute.`,
    severity: 'error',
    hasDocumentationLink: false,
  });
}

export function reportEvalErrorDiagnostic(attr: string): Diagnostic {
  return createDiagnostic({
    name: BuiltinDiagnostics.REPORT_EVAL_ERROR,
    message: `The checks layered onto ‘${attr}’ failed to evaluate; its embedded reports were dropped. Re-run with --show-trace to see why.`,
    severity: 'notice',
    hasDocumentationLink: false,
  });
}
