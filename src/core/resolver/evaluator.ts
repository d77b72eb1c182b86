/**
 * Boundary to the external build-description evaluator.
 */
import { runProcess, type ProcessResult } from '../../utils/process.js';
import { EvaluatorError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Evaluates one expression and returns its JSON value.
 */
export interface Evaluator {
  evaluate(expression: string): Promise<unknown>;
}

export interface NixInstantiateOptions {
  /** Evaluator executable (default: nix-instantiate) */
  command?: string;
  /** Pass --show-trace through */
  showTrace?: boolean;
  cwd?: string;
}

/**
 * Runs `nix-instantiate --strict --json --eval -` with the expression on
 * stdin.
 */
export class NixInstantiateEvaluator implements Evaluator {
  private readonly command: string;
  private readonly showTrace: boolean;
  private readonly cwd?: string;

  constructor(options: NixInstantiateOptions = {}) {
    this.command = options.command ?? 'nix-instantiate';
    this.showTrace = options.showTrace ?? false;
    this.cwd = options.cwd;
  }

  args(): string[] {
    const args = ['--strict', '--json', '--eval', '-'];
    if (this.showTrace) {
      args.push('--show-trace');
    }
    return args;
  }

  async evaluate(expression: string): Promise<unknown> {
    const log = logger.child('evaluator');
    log.debug(`Running ${this.command} ${this.args().join(' ')}`);
    log.debug('Expression:\n' + expression);

    let result: ProcessResult;
    try {
      result = await runProcess(this.command, this.args(), { input: expression, cwd: this.cwd });
    } catch (error) {
      throw new EvaluatorError(
        ErrorCodes.EVALUATOR_SPAWN_FAILED,
        `Could not run ${this.command}: ${error instanceof Error ? error.message : String(error)}`,
        { command: this.command }
      );
    }

    if (result.exitCode !== 0) {
      throw new EvaluatorError(
        ErrorCodes.EVALUATOR_FAILED,
        `${this.command} failed with exit code ${result.exitCode ?? result.signal}`,
        { command: this.command, stderr: result.stderr }
      );
    }

    try {
      return JSON.parse(result.stdout);
    } catch (error) {
      throw new EvaluatorError(
        ErrorCodes.EVALUATOR_BAD_OUTPUT,
        `${this.command} did not print JSON: ${error instanceof Error ? error.message : String(error)}`,
        { command: this.command, stdout: result.stdout }
      );
    }
  }
}
