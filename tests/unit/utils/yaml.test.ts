/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('name: test\nitems:\n  - a\n  - b')).toEqual({ name: 'test', items: ['a', 'b'] });
  });

  it('should throw SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: x', Schema)).toEqual({ name: 'x', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('name: 3', Schema)).toThrow(/name:/);
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = Schema.safeParse({ name: 1, count: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      const text = formatZodError(result.error);
      expect(text).toContain('name: ');
      expect(text).toContain('count: ');
    }
  });
});

describe('loadYamlWithSchema', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `attrlint-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load and validate a file', async () => {
    const file = join(tempDir, 'c.yaml');
    writeFileSync(file, 'name: loaded\ncount: 4\n');

    expect(await loadYamlWithSchema(file, Schema)).toEqual({ name: 'loaded', count: 4 });
  });

  it('should name the file in validation errors', async () => {
    const file = join(tempDir, 'bad.yaml');
    writeFileSync(file, 'count: 4\n');

    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow(`(file: ${file})`);
  });

  it('should fail for a missing file', async () => {
    await expect(loadYamlWithSchema(join(tempDir, 'missing.yaml'), Schema)).rejects.toThrow(SystemError);
  });
});
