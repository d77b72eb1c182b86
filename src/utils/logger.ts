/**
 * Leveled logging for the attrlint CLI.
 *
 * Everything goes to stderr: stdout is reserved for the rendered bundle so
 * that `--json` output can be piped straight into other tools.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  error: 1,
  silent: 2,
};

class Logger {
  constructor(
    private level: LogLevel = 'error',
    private readonly scope: string = ''
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Generated expressions, plugin invocations; shown with --debug. */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    this.write(chalk.gray, `[DEBUG] ${this.scoped(message)}`);
    if (data) {
      this.write(chalk.gray, JSON.stringify(data, null, 2));
    }
  }

  /** Fatal conditions; the cause's stack follows when there is one. */
  error(message: string, cause?: Error | Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    this.write(chalk.red, `[ERROR] ${this.scoped(message)}`);
    if (cause instanceof Error) {
      this.write(chalk.red, cause.stack ?? cause.message);
    } else if (cause) {
      this.write(chalk.red, JSON.stringify(cause, null, 2));
    }
  }

  /**
   * Logger tagged `[scope]`. It copies the current level; later changes to
   * the parent do not reach it.
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private scoped(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }

  private write(color: (text: string) => string, text: string): void {
    console.error(color(text));
  }
}

export const logger = new Logger();

export { Logger };
