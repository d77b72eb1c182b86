/**
 * Error types and codes for attrlint.
 * Every error raised by the pipeline extends AttrlintError.
 */

/**
 * Base error class for all attrlint errors.
 */
export class AttrlintError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AttrlintError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * The build-description evaluator could not be run or returned garbage.
 * Fatal for the whole run.
 */
export class EvaluatorError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'EvaluatorError';
  }
}

/**
 * A check plugin crashed, timed out or broke the protocol.
 * Details always carry the plugin name and the exact input payload.
 */
export class PluginError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PluginError';
  }

  get plugin(): string | undefined {
    const plugin = this.details?.plugin;
    return typeof plugin === 'string' ? plugin : undefined;
  }

  get input(): string | undefined {
    const input = this.details?.input;
    return typeof input === 'string' ? input : undefined;
  }
}

/**
 * A wire payload did not match the protocol schema.
 */
export class ProtocolError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ProtocolError';
  }
}

/**
 * A report references a source location that cannot be rendered.
 * Points at a location-tracking bug upstream.
 */
export class RenderError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RenderError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends AttrlintError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // Evaluator
  EVALUATOR_SPAWN_FAILED: 'V001',
  EVALUATOR_FAILED: 'V002',
  EVALUATOR_BAD_OUTPUT: 'V003',
  EVALUATOR_MISSING_ATTR: 'V004',

  // Plugins
  PLUGIN_SPAWN_FAILED: 'P001',
  PLUGIN_EXIT: 'P002',
  PLUGIN_TIMEOUT: 'P003',
  PLUGIN_BAD_OUTPUT: 'P004',
  PLUGIN_UNKNOWN_ATTR: 'P005',

  // Wire protocol
  INVALID_PAYLOAD: 'W001',

  // Rendering
  SOURCE_FILE_MISSING: 'R001',
  SOURCE_LINE_OUT_OF_RANGE: 'R002',

  // System
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
