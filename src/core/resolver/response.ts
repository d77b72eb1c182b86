/**
 * Validation of the evaluator's JSON response.
 */
import { z } from 'zod';
import { EvaluatorError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { SeveritySchema, WireDiagnosticSchema, WireLocationSchema } from '../report/codec.js';

/** Reports embedded by transformations; severity may be left out. */
export const EmbeddedReportSchema = WireDiagnosticSchema.extend({
  severity: SeveritySchema.default('warning'),
});

export const EvalEntrySchema = z.object({
  status: z.enum(['resolved', 'failed', 'not-found']).default('resolved'),
  report: z.array(EmbeddedReportSchema).default([]),
  reportEvaluated: z.boolean().default(true),
  /** Either a structured location or a `file:line[:column]` string */
  location: z.union([WireLocationSchema, z.string()]).nullable().default(null),
  outputPath: z.string().nullable().default(null),
  drvPath: z.string().nullable().default(null),
});

export type EvalEntry = z.infer<typeof EvalEntrySchema>;

export const EvalResponseSchema = z.record(z.string(), EvalEntrySchema);

/**
 * Validate the response and pick out the requested attributes in order.
 * An attribute the evaluator left out is fatal: it would otherwise vanish
 * from the bundle.
 */
export function decodeEvalResponse(
  raw: unknown,
  attrNames: readonly string[]
): Array<[string, EvalEntry]> {
  const result = EvalResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new EvaluatorError(
      ErrorCodes.EVALUATOR_BAD_OUTPUT,
      `Unexpected evaluator response: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }

  const response = result.data;
  return attrNames.map((name) => {
    if (!Object.prototype.hasOwnProperty.call(response, name)) {
      throw new EvaluatorError(
        ErrorCodes.EVALUATOR_MISSING_ATTR,
        `Evaluator response has no entry for ‘${name}’`,
        { attribute: name }
      );
    }
    return [name, response[name]];
  });
}
