/**
 * CLI Argument Parsing Tests
 */

import { describe, test, expect } from 'vitest';
import { parseCliArgs, requireDocumentPaths } from '../cli/args';
import { UsageError } from '../utils/errors';

describe('parseCliArgs', () => {
  test('handles empty args', () => {
    expect(parseCliArgs([])).toEqual({
      positionals: [],
      resources: false,
      detailed: false,
      help: false,
      version: false,
    });
  });

  test('collects positionals in order', () => {
    expect(parseCliArgs(['state.json', 'plan.json']).positionals).toEqual([
      'state.json',
      'plan.json',
    ]);
  });

  test('parses flags mixed with positionals', () => {
    const result = parseCliArgs(['--ignore-order', 'state.json', '--no-color', 'plan.json']);
    expect(result.positionals).toEqual(['state.json', 'plan.json']);
    expect(result.ignoreOrder).toBe(true);
    expect(result.color).toBe(false);
  });

  test('--detailed implies --resources', () => {
    const result = parseCliArgs(['--detailed']);
    expect(result.detailed).toBe(true);
    expect(result.resources).toBe(true);
  });

  test('parses -h and -v short forms', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['-v']).version).toBe(true);
  });

  test('treats everything after -- as positional', () => {
    expect(parseCliArgs(['--', '-state.json', '--resources']).positionals).toEqual([
      '-state.json',
      '--resources',
    ]);
  });

  test('rejects unknown options', () => {
    expect(() => parseCliArgs(['--json'])).toThrow(UsageError);
    expect(() => parseCliArgs(['--json'])).toThrow('Unknown option: --json');
  });
});

describe('requireDocumentPaths', () => {
  test('returns the state and plan paths', () => {
    expect(requireDocumentPaths(parseCliArgs(['a.json', 'b.json']))).toEqual({
      statePath: 'a.json',
      planPath: 'b.json',
    });
  });

  test.each<[string[]]>([[[]], [['only.json']], [['a.json', 'b.json', 'c.json']]])(
    'rejects %j',
    args => {
      expect(() => requireDocumentPaths(parseCliArgs(args))).toThrow(
        `Expected 2 arguments (state file and plan file), got ${args.length}`
      );
    }
  );
});
