/**
 * The check command: resolve attributes, run checks, render the bundle.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, toChecksConfig } from '../../core/config/loader.js';
import { runLint } from '../../core/pipeline.js';
import { NixInstantiateEvaluator, type Evaluator } from '../../core/resolver/evaluator.js';
import { discoverTransformations } from '../../core/resolver/transformations.js';
import { ProcessPluginRunner } from '../../core/checks/runner.js';
import type { PluginRunner } from '../../core/checks/types.js';
import { createFormatter } from '../formatters/index.js';
import { logger } from '../../utils/logger.js';
import { AttrlintError, PluginError } from '../../utils/errors.js';

export interface CheckOptions {
  file?: string;
  exclude: string[];
  json?: boolean;
  showTrace?: boolean;
  debug?: boolean;
  config?: string;
  color: boolean;
}

/**
 * Seams for tests; the CLI uses the real process environment.
 */
export interface CheckEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  write: (text: string) => void;
  createEvaluator: (options: { command: string; showTrace: boolean; cwd: string }) => Evaluator;
  createRunner: () => PluginRunner;
}

export function defaultCheckEnvironment(): CheckEnvironment {
  return {
    cwd: process.cwd(),
    env: process.env,
    write: (text) => process.stdout.write(text),
    createEvaluator: (options) => new NixInstantiateEvaluator(options),
    createRunner: () => new ProcessPluginRunner(),
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Report rule violations for attributes of a package set')
    .argument('<attr-paths...>', 'Attribute paths to check')
    .option('-f, --file <path>', 'Package set to check (default: package_set from config, else ".")')
    .option('-e, --exclude <rule>', 'Skip a rule (repeatable)', collect, [])
    .option('--json', 'Output in JSON format')
    .option('--show-trace', 'Pass --show-trace to the evaluator')
    .option('--debug', 'Log the generated expression and check invocations')
    .option('--config <path>', 'Path to config file')
    .option('--no-color', 'Disable colored output')
    .action(async (attrPaths: string[], options: CheckOptions) => {
      process.exitCode = await runCheck(attrPaths, options);
    });
}

/**
 * Run one check and render it. Returns the exit code: 0 whenever a bundle
 * was produced, whatever its severities; 1 on any fatal error.
 */
export async function runCheck(
  attrPaths: string[],
  options: CheckOptions,
  environment: CheckEnvironment = defaultCheckEnvironment()
): Promise<number> {
  const previousLevel = logger.getLevel();
  if (options.debug) {
    logger.setLevel('debug');
  }

  try {
    const projectRoot = environment.cwd;
    const config = await loadConfig(projectRoot, options.config);
    const checks = toChecksConfig(config, {
      exclude: options.exclude,
      env: environment.env,
      projectRoot,
    });

    const transformations = await discoverTransformations(
      path.resolve(projectRoot, config.overlays_dir),
      checks.excluded
    );

    const { bundle } = await runLint(
      {
        attrPaths,
        packageSetPath: options.file ?? config.package_set,
        transformations,
        checks,
        cwd: projectRoot,
      },
      {
        evaluator: environment.createEvaluator({
          command: config.evaluator.command,
          showTrace: options.showTrace ?? config.evaluator.show_trace,
          cwd: projectRoot,
        }),
        runner: environment.createRunner(),
      }
    );

    const formatter = createFormatter({
      format: options.json ? 'json' : 'terminal',
      colors: options.color,
      docsUrl: config.docs_url,
    });
    environment.write(formatter.format(bundle) + '\n');
    return 0;
  } catch (error) {
    reportFatal(error);
    return 1;
  } finally {
    logger.setLevel(previousLevel);
  }
}

function reportFatal(error: unknown): void {
  if (error instanceof PluginError) {
    logger.error(error.message);
    if (error.input !== undefined) {
      logger.error(`Input passed to ‘${error.plugin ?? 'unknown'}’:\n${error.input}`);
    }
    const stderr = error.details?.stderr;
    if (typeof stderr === 'string' && stderr.trim().length > 0) {
      logger.error(`Its stderr:\n${stderr.trimEnd()}`);
    }
    return;
  }

  if (error instanceof AttrlintError) {
    logger.error(error.message);
    const stderr = error.details?.stderr;
    if (typeof stderr === 'string' && stderr.trim().length > 0) {
      logger.error(stderr.trimEnd());
    }
    return;
  }

  logger.error('Unexpected failure', error instanceof Error ? error : { error: String(error) });
}
