/**
 * Wire forms of the report model, shared by the evaluator response, the
 * plugin protocol and the JSON renderer.
 *
 * Encoding never emits `null`: absent optional fields are left out. Paths
 * are plain strings and line/column stay integers, so anything encoded here
 * decodes back to the same values.
 */
import { z } from 'zod';
import { ProtocolError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { createDiagnostic } from './diagnostic.js';
import type {
  AttributeDescriptor,
  Diagnostic,
  DiagnosticBundle,
  SourceLocation,
} from './types.js';

/** Version of the plugin batch protocol spoken by this build. */
export const PROTOCOL_VERSION = 1;

export const SeveritySchema = z.enum(['notice', 'warning', 'error']);

export const WireLocationSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
  column: z.number().int().positive().optional(),
});

/** Diagnostic as plugins write it. */
export const WireDiagnosticSchema = z.object({
  name: z.string().min(1),
  msg: z.string(),
  severity: SeveritySchema,
  locations: z.array(WireLocationSchema).default([]),
  link: z.boolean().default(true),
});

export const WireDiagnosticListSchema = z.array(WireDiagnosticSchema);

export const WireDescriptorSchema = z.object({
  name: z.string().min(1),
  location: WireLocationSchema.optional(),
  drv: z.string().optional(),
  output: z.string().optional(),
});

export type WireLocation = z.infer<typeof WireLocationSchema>;
export type WireDiagnostic = z.infer<typeof WireDiagnosticSchema>;
export type WireDescriptor = z.infer<typeof WireDescriptorSchema>;
export type WireBundle = Record<string, WireDiagnostic[]>;
type ZodIssue = z.ZodError['issues'][number];

export function encodeLocation(location: SourceLocation): WireLocation {
  const wire: WireLocation = { file: location.file, line: location.line };
  if (location.column !== undefined) {
    wire.column = location.column;
  }
  return wire;
}

export function decodeLocation(wire: WireLocation): SourceLocation {
  return wire.column === undefined
    ? { file: wire.file, line: wire.line }
    : { file: wire.file, line: wire.line, column: wire.column };
}

export function encodeDiagnostic(diagnostic: Diagnostic): WireDiagnostic {
  return {
    name: diagnostic.name,
    msg: diagnostic.message,
    severity: diagnostic.severity,
    locations: diagnostic.locations.map(encodeLocation),
    link: diagnostic.hasDocumentationLink,
  };
}

export function decodeDiagnostic(wire: WireDiagnostic): Diagnostic {
  return createDiagnostic({
    name: wire.name,
    message: wire.msg,
    severity: wire.severity,
    locations: wire.locations.map(decodeLocation),
    hasDocumentationLink: wire.link,
  });
}

export function encodeDescriptor(descriptor: AttributeDescriptor): WireDescriptor {
  const wire: WireDescriptor = { name: descriptor.name };
  if (descriptor.location) {
    wire.location = encodeLocation(descriptor.location);
  }
  if (descriptor.buildPlanPath !== undefined) {
    wire.drv = descriptor.buildPlanPath;
  }
  if (descriptor.artifactPath !== undefined) {
    wire.output = descriptor.artifactPath;
  }
  return wire;
}

/**
 * Serialize the descriptor batch sent to every plugin.
 */
export function encodeDescriptorBatch(descriptors: readonly AttributeDescriptor[]): string {
  return JSON.stringify(descriptors.map(encodeDescriptor));
}

export function encodeBundle(bundle: DiagnosticBundle): WireBundle {
  const wire: WireBundle = {};
  for (const [attr, diagnostics] of bundle) {
    wire[attr] = diagnostics.map(encodeDiagnostic);
  }
  return wire;
}

/**
 * Validate an already-parsed bundle payload. Key order is preserved.
 */
export function decodeBundleValue(value: unknown): DiagnosticBundle {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ProtocolError(
      ErrorCodes.INVALID_PAYLOAD,
      'Invalid diagnostic bundle: expected an object keyed by attribute name'
    );
  }

  // Keys come from the parsed object itself: a zod record copies entries
  // into a fresh object, where an own `__proto__` key would disappear.
  const bundle: DiagnosticBundle = new Map();
  const issues: ZodIssue[] = [];
  for (const [attr, entry] of Object.entries(value)) {
    const result = WireDiagnosticListSchema.safeParse(entry);
    if (result.success) {
      bundle.set(attr, result.data.map(decodeDiagnostic));
    } else {
      issues.push(...result.error.issues.map((issue) => ({ ...issue, path: [attr, ...issue.path] })));
    }
  }

  if (issues.length > 0) {
    throw new ProtocolError(
      ErrorCodes.INVALID_PAYLOAD,
      `Invalid diagnostic bundle: ${formatZodError(new z.ZodError(issues))}`,
      { issues }
    );
  }
  return bundle;
}

export function decodeBundle(text: string): DiagnosticBundle {
  return decodeBundleValue(parseJson(text));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(
      ErrorCodes.INVALID_PAYLOAD,
      `Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
