import { runProcess } from '../../utils/process.js';
import { PROTOCOL_VERSION } from '../report/codec.js';
import type { PluginRunner, PluginRunOptions, PluginRunResult } from './types.js';

/** Tells a plugin which batch protocol it is being spoken to in. */
export const PROTOCOL_VERSION_ENV_VAR = 'ATTRLINT_PROTOCOL_VERSION';

/**
 * Spawns each plugin as a subprocess with no arguments.
 */
export class ProcessPluginRunner implements PluginRunner {
  async run(executable: string, input: string, options: PluginRunOptions): Promise<PluginRunResult> {
    const result = await runProcess(executable, [], {
      input,
      timeoutMs: options.timeoutMs,
      env: { [PROTOCOL_VERSION_ENV_VAR]: String(PROTOCOL_VERSION) },
    });
    return {
      exitCode: result.exitCode,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
    };
  }
}
