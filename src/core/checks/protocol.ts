/**
 * External check protocol: every registered plugin gets the encoded
 * descriptor batch on stdin and answers with a bundle on stdout.
 *
 * Plugins share no state, so they run concurrently up to the configured
 * limit. Their contributions come back in registration order however they
 * finish. Any plugin failure aborts the run.
 */
import { PluginError, ProtocolError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { decodeBundle, encodeDescriptorBatch } from '../report/codec.js';
import type { AttributeDescriptor, DiagnosticBundle } from '../report/types.js';
import { registeredChecks, resolveExecutable } from './registry.js';
import type { ChecksConfig, PluginContribution, PluginRunner, PluginRunResult } from './types.js';

/**
 * Run `fn` over `items` with at most `limit` in flight. Results keep the
 * order of `items`.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.min(Math.max(limit, 1), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Invoke every registered plugin once and collect their bundles.
 */
export async function runChecks(
  descriptors: readonly AttributeDescriptor[],
  config: ChecksConfig,
  runner: PluginRunner
): Promise<PluginContribution[]> {
  const plugins = registeredChecks(config);
  if (plugins.length === 0) {
    return [];
  }

  const input = encodeDescriptorBatch(descriptors);
  const known = new Set(descriptors.map((d) => d.name));

  logger.debug(`Running ${plugins.length} check(s) with concurrency ${config.concurrency}`, { plugins });
  const settled = await settleWithConcurrency(plugins, config.concurrency, async (plugin) => {
    const executable = await resolveExecutable(plugin, config.searchPath);
    return invokePlugin(plugin, executable, input, known, config, runner);
  });

  return settled.map((result, i) => {
    if (result.status === 'rejected') {
      throw result.reason instanceof PluginError
        ? result.reason
        : new PluginError(
            ErrorCodes.PLUGIN_SPAWN_FAILED,
            `Check ‘${plugins[i]}’ failed: ${describe(result.reason)}`,
            { plugin: plugins[i], input }
          );
    }
    return { plugin: plugins[i], bundle: result.value };
  });
}

async function invokePlugin(
  plugin: string,
  executable: string,
  input: string,
  known: ReadonlySet<string>,
  config: ChecksConfig,
  runner: PluginRunner
): Promise<DiagnosticBundle> {
  logger.debug(`Invoking check ‘${plugin}’ (${executable})`);

  let result: PluginRunResult;
  try {
    result = await runner.run(executable, input, { timeoutMs: config.timeoutMs });
  } catch (error) {
    throw new PluginError(
      ErrorCodes.PLUGIN_SPAWN_FAILED,
      `Check ‘${plugin}’ could not be started: ${describe(error)}`,
      { plugin, executable, input }
    );
  }

  if (result.timedOut) {
    throw new PluginError(
      ErrorCodes.PLUGIN_TIMEOUT,
      `Check ‘${plugin}’ timed out after ${config.timeoutMs}ms`,
      { plugin, input, stderr: result.stderr }
    );
  }

  if (result.exitCode !== 0) {
    const status = result.exitCode === null ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
    throw new PluginError(
      ErrorCodes.PLUGIN_EXIT,
      `Check ‘${plugin}’ failed with ${status}`,
      { plugin, input, exitCode: result.exitCode, stderr: result.stderr }
    );
  }

  return decodePluginOutput(plugin, result.stdout, input, known);
}

/**
 * Empty output means no diagnostics anywhere. Anything else must be a
 * bundle naming only attributes from the batch.
 */
export function decodePluginOutput(
  plugin: string,
  stdout: string,
  input: string,
  known: ReadonlySet<string>
): DiagnosticBundle {
  if (stdout.trim().length === 0) {
    return new Map();
  }

  let bundle: DiagnosticBundle;
  try {
    bundle = decodeBundle(stdout);
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw new PluginError(
        ErrorCodes.PLUGIN_BAD_OUTPUT,
        `Check ‘${plugin}’ produced malformed output: ${error.message}`,
        { plugin, input, stdout }
      );
    }
    throw error;
  }

  for (const attr of bundle.keys()) {
    if (!known.has(attr)) {
      throw new PluginError(
        ErrorCodes.PLUGIN_UNKNOWN_ATTR,
        `Check ‘${plugin}’ reported on ‘${attr}’, which was not in its input`,
        { plugin, input, attribute: attr }
      );
    }
  }

  return bundle;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
