/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createCheckCommand, runCheck, type CheckEnvironment, type CheckOptions } from '../../../../src/cli/commands/check.js';
import { createCli } from '../../../../src/cli/index.js';
import { logger } from '../../../../src/utils/logger.js';
import { FakeEvaluator, FakePluginRunner, pluginOutput, resolvedEntry, type FakePlugin } from '../../../fixtures/fakes.js';

describe('check command', () => {
  let tempDir: string;
  let output: string[];
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = join(tmpdir(), `attrlint-check-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    output = [];
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    errorSpy.mockRestore();
    logger.setLevel('error');
  });

  function options(overrides: Partial<CheckOptions> = {}): CheckOptions {
    return { exclude: [], color: false, ...overrides };
  }

  function environment(
    response: unknown,
    plugins: Record<string, FakePlugin> = {},
    env: NodeJS.ProcessEnv = {}
  ): CheckEnvironment & { evaluator: FakeEvaluator; runner: FakePluginRunner; evaluatorOptions: unknown[] } {
    const evaluator = new FakeEvaluator(response);
    const runner = new FakePluginRunner(plugins);
    const evaluatorOptions: unknown[] = [];
    return {
      cwd: tempDir,
      env,
      write: (text) => output.push(text),
      createEvaluator: (opts) => {
        evaluatorOptions.push(opts);
        return evaluator;
      },
      createRunner: () => runner,
      evaluator,
      runner,
      evaluatorOptions,
    };
  }

  function stderr(): string {
    return errorSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  it('should render terminal output and exit 0 even with errors', async () => {
    const env = environment({ missing: { status: 'not-found' } });

    const code = await runCheck(['missing'], options({ file: './pkgs' }), env);

    expect(code).toBe(0);
    expect(output.join('')).toBe(
      'When evaluating attribute ‘missing’:\nerror: AttrPathNotFound\nPackages in ‘./pkgs’ do not contain ‘missing’ attribute.\n'
    );
  });

  it('should render JSON when asked', async () => {
    const env = environment({ pkgA: resolvedEntry() }, {}, {});

    const code = await runCheck(['pkgA'], options({ json: true }), env);

    expect(code).toBe(0);
    expect(JSON.parse(output.join(''))).toEqual({
      pkgA: [
        {
          name: 'no-build-output',
          msg: '‘pkgA’ has not yet been built. Checks that need the build output will not be run.',
          severity: 'notice',
          locations: [],
          link: false,
        },
      ],
    });
  });

  it('should discover plugins from the environment listing', async () => {
    const env = environment(
      { pkgA: resolvedEntry() },
      { 'license-check': { stdout: pluginOutput({ pkgA: [{ name: 'license-mismatch', severity: 'warning' }] }) } },
      { ATTRLINT_CHECKS: 'license-check' }
    );

    await runCheck(['pkgA'], options({ json: true, exclude: ['no-build-output'] }), env);

    expect(JSON.parse(output.join('')).pkgA.map((d: { name: string }) => d.name)).toEqual(['license-mismatch']);
  });

  it('should pass overlays from the configured directory to the evaluator', async () => {
    mkdirSync(join(tempDir, 'overlays'));
    writeFileSync(join(tempDir, 'overlays', 'unused-dependency.nix'), 'final: prev: prev');
    writeFileSync(join(tempDir, 'overlays', 'skipped.nix'), 'final: prev: prev');
    const env = environment({ pkgA: resolvedEntry() });

    await runCheck(['pkgA'], options({ exclude: ['skipped'] }), env);

    const expression = env.evaluator.expressions[0];
    expect(expression).toContain(join(tempDir, 'overlays', 'unused-dependency.nix'));
    expect(expression).not.toContain('skipped.nix');
    expect(expression).toContain(`import "${tempDir}" {`);
  });

  it('should read the package set and evaluator settings from the config file', async () => {
    writeFileSync(
      join(tempDir, '.attrlint.yaml'),
      'package_set: ./nixpkgs\nevaluator:\n  command: /opt/nix/bin/nix-instantiate\n  show_trace: true\n'
    );
    const env = environment({ pkgA: resolvedEntry() });

    await runCheck(['pkgA'], options(), env);

    expect(env.evaluator.expressions[0]).toContain(`import "${join(tempDir, 'nixpkgs')}" {`);
    expect(env.evaluatorOptions).toEqual([
      { command: '/opt/nix/bin/nix-instantiate', showTrace: true, cwd: tempDir },
    ]);
  });

  it('should exit 1 and print the plugin input when a plugin fails', async () => {
    const env = environment(
      { pkgA: resolvedEntry() },
      { crashy: { exitCode: 1, stderr: 'Traceback (most recent call last)' } },
      { ATTRLINT_CHECKS: 'crashy' }
    );

    const code = await runCheck(['pkgA'], options(), env);

    expect(code).toBe(1);
    expect(output).toEqual([]);
    const text = stderr();
    expect(text).toContain('Check ‘crashy’ failed with exit code 1');
    expect(text).toContain('Input passed to ‘crashy’:');
    expect(text).toContain('[{"name":"pkgA"}]');
    expect(text).toContain('Traceback (most recent call last)');
  });

  it('should exit 1 when the evaluator response is unusable', async () => {
    const env = environment({});

    const code = await runCheck(['pkgA'], options(), env);

    expect(code).toBe(1);
    expect(stderr()).toContain('Evaluator response has no entry for ‘pkgA’');
  });

  it('should restore the log level after --debug', async () => {
    const env = environment({ pkgA: resolvedEntry() });

    await runCheck(['pkgA'], options({ debug: true }), env);

    expect(logger.getLevel()).toBe('error');
    expect(stderr()).toContain('[DEBUG]');
  });

  it('should declare the command-line surface', () => {
    const command = createCheckCommand();
    const flags = command.options.map((o) => o.long);

    expect(command.name()).toBe('check');
    expect(flags).toEqual(
      expect.arrayContaining(['--file', '--exclude', '--json', '--show-trace', '--debug', '--config', '--no-color'])
    );
  });

  it('should collect repeated --exclude flags', () => {
    const command = createCheckCommand();
    command.parseOptions(['-e', 'a', '--exclude', 'b']);

    expect(command.opts().exclude).toEqual(['a', 'b']);
  });

  it('should make check the default command', () => {
    const cli = createCli();

    expect(cli.name()).toBe('attrlint');
    expect(cli.commands.map((c) => c.name())).toEqual(['check']);
  });
});
