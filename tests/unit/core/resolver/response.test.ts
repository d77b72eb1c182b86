/**
 * Tests for evaluator response validation.
 */
import { describe, it, expect } from 'vitest';
import { decodeEvalResponse } from '../../../../src/core/resolver/response.js';
import { EvaluatorError } from '../../../../src/utils/errors.js';

describe('decodeEvalResponse', () => {
  it('should fill in defaults for a minimal entry', () => {
    const [[name, entry]] = decodeEvalResponse({ pkgA: {} }, ['pkgA']);

    expect(name).toBe('pkgA');
    expect(entry).toEqual({
      status: 'resolved',
      report: [],
      reportEvaluated: true,
      location: null,
      outputPath: null,
      drvPath: null,
    });
  });

  it('should default embedded report severity to warning', () => {
    const [[, entry]] = decodeEvalResponse({ a: { report: [{ name: 'r', msg: 'm' }] } }, ['a']);

    expect(entry.report).toEqual([{ name: 'r', msg: 'm', severity: 'warning', locations: [], link: true }]);
  });

  it('should accept both location forms', () => {
    const entries = decodeEvalResponse(
      {
        a: { location: '/a.nix:3' },
        b: { location: { file: '/b.nix', line: 4, column: 2 } },
      },
      ['a', 'b']
    );

    expect(entries.map(([, e]) => e.location)).toEqual(['/a.nix:3', { file: '/b.nix', line: 4, column: 2 }]);
  });

  it('should return entries in request order', () => {
    const entries = decodeEvalResponse({ a: {}, b: {} }, ['b', 'a']);

    expect(entries.map(([name]) => name)).toEqual(['b', 'a']);
  });

  it('should fail when a requested attribute is missing', () => {
    expect(() => decodeEvalResponse({ a: {} }, ['a', 'b'])).toThrow(/no entry for ‘b’/);
  });

  it('should fail on an unknown status', () => {
    expect(() => decodeEvalResponse({ a: { status: 'weird' } }, ['a'])).toThrow(EvaluatorError);
  });

  it('should fail on a non-object response', () => {
    expect(() => decodeEvalResponse('nope', ['a'])).toThrow(EvaluatorError);
  });
});
