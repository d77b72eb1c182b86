import chalk from 'chalk';
import { readFileSync } from '../../utils/file-system.js';
import { RenderError, ErrorCodes } from '../../utils/errors.js';
import { documentationUrl } from '../../core/report/diagnostic.js';
import { formatLocation } from '../../core/report/location.js';
import { DEFAULT_DOCS_URL } from '../../core/config/schema.js';
import type { Diagnostic, DiagnosticBundle, Severity, SourceLocation } from '../../core/report/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'bold' | 'dim';

const SEVERITY_COLORS: Record<Severity, Color> = {
  notice: 'blue',
  warning: 'yellow',
  error: 'red',
};

/**
 * Human-readable output with source excerpts.
 *
 * Locations are read from disk while formatting. A file that is gone or a
 * line past its end throws a RenderError instead of being skipped.
 */
export class TerminalFormatter implements IFormatter {
  private options: FormatOptions;
  private sources = new Map<string, string[]>();

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'terminal',
      colors: options.colors ?? true,
      docsUrl: options.docsUrl ?? DEFAULT_DOCS_URL,
    };
  }

  format(bundle: DiagnosticBundle): string {
    const sections: string[] = [];
    for (const [attr, diagnostics] of bundle) {
      sections.push(this.formatAttribute(attr, diagnostics));
    }
    return sections.join('\n\n');
  }

  formatAttribute(attr: string, diagnostics: readonly Diagnostic[]): string {
    const header = this.colorize(`When evaluating attribute ‘${attr}’:`, 'bold');
    if (diagnostics.length === 0) {
      return `${header}\n${this.colorize(`Nothing wrong with ‘${attr}’`, 'green')}`;
    }
    return [header, ...diagnostics.map((d) => this.formatDiagnostic(d))].join('\n');
  }

  formatDiagnostic(diagnostic: Diagnostic): string {
    const lines: string[] = [];
    lines.push(this.colorize(`${diagnostic.severity}: ${diagnostic.name}`, SEVERITY_COLORS[diagnostic.severity]));
    lines.push(diagnostic.message);

    for (const location of diagnostic.locations) {
      lines.push(...this.formatExcerpt(location));
    }

    const url = documentationUrl(diagnostic, this.options.docsUrl);
    if (url) {
      lines.push(`See: ${url}`);
    }

    return lines.join('\n');
  }

  /**
   * `Near file:line:col:` followed by the source line and a caret under
   * the column (the first character when there is none).
   */
  formatExcerpt(location: SourceLocation): string[] {
    const source = this.readSource(location.file);
    if (location.line > source.length) {
      throw new RenderError(
        ErrorCodes.SOURCE_LINE_OUT_OF_RANGE,
        `Line ${location.line} is past the end of ${location.file} (${source.length} lines)`,
        { file: location.file, line: location.line }
      );
    }

    const text = source[location.line - 1];
    const lineNumber = String(location.line);
    const gutter = ' '.repeat(lineNumber.length);
    // Tabs stay tabs so the caret lines up however the terminal expands them.
    const caretOffset = text
      .slice(0, (location.column ?? 1) - 1)
      .padEnd((location.column ?? 1) - 1)
      .replace(/[^\t]/g, ' ');

    return [
      `Near ${formatLocation(location)}:`,
      this.colorize(`${gutter} |`, 'dim'),
      `${this.colorize(`${lineNumber} |`, 'dim')} ${text}`,
      `${this.colorize(`${gutter} |`, 'dim')} ${caretOffset}${this.colorize('^', 'red')}`,
    ];
  }

  private readSource(file: string): string[] {
    const cached = this.sources.get(file);
    if (cached) {
      return cached;
    }

    let content: string;
    try {
      content = readFileSync(file);
    } catch (error) {
      throw new RenderError(
        ErrorCodes.SOURCE_FILE_MISSING,
        `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { file }
      );
    }

    const lines = content.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    this.sources.set(file, lines);
    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'bold':
        return chalk.bold(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
