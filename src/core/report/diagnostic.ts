import type { Diagnostic, Severity, SourceLocation } from './types.js';

export interface DiagnosticInit {
  name: string;
  message: string;
  severity: Severity;
  locations?: SourceLocation[];
  hasDocumentationLink?: boolean;
}

/**
 * Build a frozen diagnostic. Links default to on, locations to none.
 */
export function createDiagnostic(init: DiagnosticInit): Diagnostic {
  const locations = (init.locations ?? []).map((loc) => Object.freeze({ ...loc }));
  return Object.freeze({
    name: init.name,
    message: init.message,
    severity: init.severity,
    locations: Object.freeze(locations),
    hasDocumentationLink: init.hasDocumentationLink ?? true,
  });
}

/**
 * Documentation URL for a diagnostic, or undefined when it has none.
 */
export function documentationUrl(diagnostic: Diagnostic, baseUrl: string): string | undefined {
  if (!diagnostic.hasDocumentationLink) {
    return undefined;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${diagnostic.name}.md`;
}
