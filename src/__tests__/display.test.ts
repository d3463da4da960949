/**
 * Drift Display Tests
 */

import { describe, test, expect } from 'vitest';
import {
  displayDiff,
  displayResourceComparison,
  formatDiffEntry,
  formatPath,
  formatValue,
} from '../commands/compare/display';
import { computeDiff } from '../engine/structural-diff';
import { TerminalUI } from '../ui';

function createSink() {
  const chunks: string[] = [];
  return {
    write(text: string) {
      chunks.push(text);
      return true;
    },
    text: () => chunks.join(''),
  };
}

describe('formatPath', () => {
  test('renders the empty path as the root', () => {
    expect(formatPath([])).toBe('(root)');
  });

  test('joins identifiers with dots and indices with brackets', () => {
    expect(formatPath(['a', 'b'])).toBe('a.b');
    expect(formatPath(['items', 0, 'id'])).toBe('items[0].id');
    expect(formatPath([0, 'a'])).toBe('[0].a');
    expect(formatPath(['my-key'])).toBe('my-key');
  });

  test('quotes keys that are not identifiers', () => {
    expect(formatPath(['tags', 'kubernetes.io/name'])).toBe('tags["kubernetes.io/name"]');
    expect(formatPath(['a b'])).toBe('["a b"]');
  });
});

describe('formatValue', () => {
  test('renders JSON text', () => {
    expect(formatValue('abc', 120)).toBe('"abc"');
    expect(formatValue(null, 120)).toBe('null');
    expect(formatValue(undefined, 120)).toBe('undefined');
  });

  test('truncates long values', () => {
    expect(formatValue({ a: 1 }, 3)).toBe('{"a…');
  });

  test('truncates on code points, never inside a surrogate pair', () => {
    expect(formatValue('😀😀', 2)).toBe('"😀…');
  });
});

describe('formatDiffEntry', () => {
  const plain = new TerminalUI(createSink());

  test('formats each kind', () => {
    expect(formatDiffEntry({ kind: 'added', path: ['k'], newValue: 'v' }, plain, 120)).toBe(
      '+ k: "v"'
    );
    expect(formatDiffEntry({ kind: 'removed', path: ['k'], oldValue: 1 }, plain, 120)).toBe(
      '- k: 1'
    );
    expect(
      formatDiffEntry({ kind: 'changed', path: ['a', 'b'], oldValue: 1, newValue: 2 }, plain, 120)
    ).toBe('~ a.b: 1 -> 2');
    expect(
      formatDiffEntry({ kind: 'type_changed', path: ['port'], oldValue: '80', newValue: 80 }, plain, 120)
    ).toBe('! port: "80" (string) -> 80 (number)');
  });

  test('colors the symbol when color is enabled', () => {
    const colored = new TerminalUI(createSink(), { color: true });
    expect(formatDiffEntry({ kind: 'added', path: ['k'], newValue: true }, colored, 120)).toBe(
      '\x1b[32m+\x1b[0m k: true'
    );
  });
});

describe('displayDiff', () => {
  test('prints nothing for an empty diff', () => {
    const sink = createSink();
    displayDiff(computeDiff({ a: 1 }, { a: 1 }), new TerminalUI(sink), 120);
    expect(sink.text()).toBe('');
  });

  test('prints one indented line per entry', () => {
    const sink = createSink();
    displayDiff(computeDiff({ a: 1, b: 2 }, { a: 3 }), new TerminalUI(sink), 120, '  ');
    expect(sink.text()).toBe('  ~ a: 1 -> 3\n  - b: 2\n');
  });
});

describe('displayResourceComparison', () => {
  test('reports an in-sync comparison', () => {
    const sink = createSink();
    displayResourceComparison(
      { added: [], removed: [], modified: new Map(), unchanged: ['aws_instance.web'] },
      new TerminalUI(sink, { width: 10 }),
      { detailed: false, maxLength: 120 }
    );
    expect(sink.text()).toBe(
      [
        '',
        'Terraform Drift Summary',
        '─'.repeat(10),
        '  Unchanged resources: 1',
        '  Drifted resources:   0',
        '',
        '  No drift detected. Infrastructure is in sync.',
        '',
      ].join('\n')
    );
  });

  test('lists modified resources with their changes when detailed', () => {
    const sink = createSink();
    displayResourceComparison(
      {
        added: [],
        removed: [],
        modified: new Map([['aws_s3_bucket.logs', computeDiff({ acl: 'private' }, { acl: 'public' })]]),
        unchanged: [],
      },
      new TerminalUI(sink, { width: 10 }),
      { detailed: true, maxLength: 120 }
    );
    expect(sink.text()).toBe(
      [
        '',
        'Terraform Drift Summary',
        '─'.repeat(10),
        '  Unchanged resources: 0',
        '  Drifted resources:   1',
        '',
        'Modified (1):',
        '  ~ aws_s3_bucket.logs',
        '      ~ acl: "private" -> "public"',
        '',
      ].join('\n')
    );
  });
});
