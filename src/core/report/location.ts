import type { SourceLocation } from './types.js';

const POSITION_WITH_COLUMN = /^(.+):(\d+):(\d+)$/;
const POSITION_LINE_ONLY = /^(.+):(\d+)$/;

/**
 * Parse an evaluator position string, `file:line` or `file:line:column`.
 *
 * The file part may contain colons itself, so the numeric groups are
 * matched from the right. Returns undefined for anything else, including
 * zero line or column numbers.
 */
export function parsePosition(position: string): SourceLocation | undefined {
  const withColumn = POSITION_WITH_COLUMN.exec(position);
  if (withColumn) {
    const [, file, line, column] = withColumn;
    return makeLocation(file, Number(line), Number(column));
  }

  const lineOnly = POSITION_LINE_ONLY.exec(position);
  if (lineOnly) {
    const [, file, line] = lineOnly;
    return makeLocation(file, Number(line));
  }

  return undefined;
}

function makeLocation(file: string, line: number, column?: number): SourceLocation | undefined {
  if (line < 1 || (column !== undefined && column < 1)) {
    return undefined;
  }
  return column === undefined ? { file, line } : { file, line, column };
}

/**
 * `file:line[:column]`
 */
export function formatLocation(location: SourceLocation): string {
  return location.column === undefined
    ? `${location.file}:${location.line}`
    : `${location.file}:${location.line}:${location.column}`;
}
