/**
 * Tests for check registration and lookup.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  defaultConcurrency,
  parseChecksList,
  registeredChecks,
  resolveExecutable,
} from '../../../../src/core/checks/registry.js';

describe('parseChecksList', () => {
  it('should split on colons and drop blanks', () => {
    expect(parseChecksList('b-check::a-check: ')).toEqual(['b-check', 'a-check']);
  });

  it('should return nothing for an unset variable', () => {
    expect(parseChecksList(undefined)).toEqual([]);
    expect(parseChecksList('')).toEqual([]);
  });
});

describe('registeredChecks', () => {
  it('should sort, deduplicate and drop excluded names', () => {
    expect(
      registeredChecks({ names: ['stale-patches', 'license', 'env-vars', 'license'], excluded: new Set(['env-vars']) })
    ).toEqual(['license', 'stale-patches']);
  });
});

describe('defaultConcurrency', () => {
  it('should stay within 2..16', () => {
    const value = defaultConcurrency();

    expect(value).toBeGreaterThanOrEqual(2);
    expect(value).toBeLessThanOrEqual(16);
  });
});

describe('resolveExecutable', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `attrlint-registry-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(tempDir, 'first'), { recursive: true });
    mkdirSync(join(tempDir, 'second'), { recursive: true });
    writeFileSync(join(tempDir, 'second', 'license'), '');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should take the first match on the search path', async () => {
    const found = await resolveExecutable('license', [join(tempDir, 'first'), join(tempDir, 'second')]);

    expect(found).toBe(join(tempDir, 'second', 'license'));
  });

  it('should fall back to the bare name', async () => {
    expect(await resolveExecutable('other', [join(tempDir, 'first')])).toBe('other');
  });
});
