import { encodeBundle } from '../../core/report/codec.js';
import type { DiagnosticBundle } from '../../core/report/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption. Emits the same wire form
 * plugins speak, so the output decodes with `decodeBundle`.
 */
export class JsonFormatter implements IFormatter {
  format(bundle: DiagnosticBundle): string {
    return JSON.stringify(encodeBundle(bundle), null, 2);
  }
}
