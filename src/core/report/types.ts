/**
 * Report model shared by every stage of the pipeline.
 */

/** Severity of a diagnostic. Order carries no meaning for merging. */
export type Severity = 'notice' | 'warning' | 'error';

/**
 * Position in a build-definition source file.
 */
export interface SourceLocation {
  readonly file: string;
  /** 1-based */
  readonly line: number;
  /** 1-based; absent when only the line is known */
  readonly column?: number;
}

/**
 * One rule violation or informational notice about an attribute.
 */
export interface Diagnostic {
  /** Stable rule identifier, used for exclusion and documentation links */
  readonly name: string;
  readonly message: string;
  readonly locations: readonly SourceLocation[];
  readonly severity: Severity;
  readonly hasDocumentationLink: boolean;
}

/**
 * Resolved metadata for one attribute.
 */
export interface AttributeDescriptor {
  /** Attribute path, unique within a run */
  readonly name: string;
  /** Declared source position */
  readonly location?: SourceLocation;
  /** Path to the build plan (.drv) */
  readonly buildPlanPath?: string;
  /** Path to the build output; set only when it exists on disk */
  readonly artifactPath?: string;
}

/**
 * Attribute name → ordered diagnostics. Insertion order is the bundle order.
 */
export type DiagnosticBundle = Map<string, Diagnostic[]>;

/**
 * Names of the diagnostics the pipeline itself emits.
 */
export const BuiltinDiagnostics = {
  EVAL_ERROR: 'EvalError',
  ATTR_PATH_NOT_FOUND: 'AttrPathNotFound',
  REPORT_EVAL_ERROR: 'ReportEvalError',
  NO_BUILD_OUTPUT: 'no-build-output',
} as const;
