/**
 * Tests for the subprocess plugin runner, against stand-in executables.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ProcessPluginRunner } from '../../../../src/core/checks/runner.js';

describe('ProcessPluginRunner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `attrlint-runner-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function plugin(name: string, body: string): string {
    const file = join(tempDir, name);
    writeFileSync(file, `#!${process.execPath}\n${body}\n`);
    chmodSync(file, 0o755);
    return file;
  }

  it('should hand the batch to stdin and announce the protocol version', async () => {
    const executable = plugin(
      'echo-check',
      'let s="";process.stdin.on("data",d=>s+=d).on("end",()=>process.stdout.write(JSON.stringify({input:s,version:process.env.ATTRLINT_PROTOCOL_VERSION,argc:process.argv.length})))'
    );

    const result = await new ProcessPluginRunner().run(executable, '[{"name":"a"}]', {});

    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.stdout)).toEqual({ input: '[{"name":"a"}]', version: '1', argc: 2 });
  });

  it('should report a timeout', async () => {
    const executable = plugin('hang-check', 'setTimeout(() => {}, 60000)');

    const result = await new ProcessPluginRunner().run(executable, '[]', { timeoutMs: 100 });

    expect(result.timedOut).toBe(true);
  });

  it('should not wait for a grandchild holding the pipes after a timeout', async () => {
    const executable = join(tempDir, 'wrapped-check');
    writeFileSync(executable, '#!/bin/sh\nsleep 5\necho done\n');
    chmodSync(executable, 0o755);

    const started = Date.now();
    const result = await new ProcessPluginRunner().run(executable, '[]', { timeoutMs: 100 });

    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe('');
    expect(Date.now() - started).toBeLessThan(2000);
  });
});
