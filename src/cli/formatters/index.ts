import { JsonFormatter } from './json.js';
import { TerminalFormatter } from './terminal.js';
import type { FormatOptions, IFormatter } from './types.js';

export { JsonFormatter, TerminalFormatter };
export type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export function createFormatter(options: FormatOptions): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new TerminalFormatter(options);
}
