/**
 * Formatter type definitions.
 */
import type { DiagnosticBundle } from '../../core/report/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'terminal' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Base URL of the per-rule explanations */
  docsUrl: string;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Render a merged bundle.
   */
  format(bundle: DiagnosticBundle): string;
}
