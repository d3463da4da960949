/**
 * Drift Display Utilities
 *
 * Render diff entries and resource comparisons as console lines
 */

import { jsonTypeOf } from '../../engine';
import type {
  DiffEntry,
  DiffKind,
  DiffPath,
  DiffResult,
  JsonValue,
  ResourceComparison,
} from '../../engine';
import type { ColorName, TerminalUI } from '../../ui';

const KIND_SYMBOLS: Record<DiffKind, { symbol: string; color: ColorName }> = {
  added: { symbol: '+', color: 'green' },
  removed: { symbol: '-', color: 'red' },
  changed: { symbol: '~', color: 'yellow' },
  type_changed: { symbol: '!', color: 'magenta' },
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Render a path as `a.b[0]["key with space"]`; the root is `(root)`.
 */
export function formatPath(path: DiffPath): string {
  if (path.length === 0) {
    return '(root)';
  }

  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      result += result === '' ? segment : `.${segment}`;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}

/**
 * JSON text of a value, cut at `maxLength` characters
 */
export function formatValue(value: JsonValue | undefined, maxLength: number): string {
  const text = value === undefined ? 'undefined' : JSON.stringify(value);
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}…` : text;
}

function describeEntry(entry: DiffEntry, maxLength: number): string {
  const path = formatPath(entry.path);
  const oldText = formatValue(entry.oldValue, maxLength);
  const newText = formatValue(entry.newValue, maxLength);

  switch (entry.kind) {
    case 'added':
      return `${path}: ${newText}`;
    case 'removed':
      return `${path}: ${oldText}`;
    case 'changed':
      return `${path}: ${oldText} -> ${newText}`;
    case 'type_changed': {
      const oldType = entry.oldValue === undefined ? 'undefined' : jsonTypeOf(entry.oldValue);
      const newType = entry.newValue === undefined ? 'undefined' : jsonTypeOf(entry.newValue);
      return `${path}: ${oldText} (${oldType}) -> ${newText} (${newType})`;
    }
  }
}

export function formatDiffEntry(entry: DiffEntry, ui: TerminalUI, maxLength: number): string {
  const { symbol, color } = KIND_SYMBOLS[entry.kind];
  return `${ui.color(symbol, color)} ${describeEntry(entry, maxLength)}`;
}

/**
 * Print one line per entry. Prints nothing for an empty diff.
 */
export function displayDiff(
  result: DiffResult,
  ui: TerminalUI,
  maxLength: number,
  indent: string = ''
): void {
  for (const entry of result.entries) {
    ui.print(`${indent}${formatDiffEntry(entry, ui, maxLength)}`);
  }
}

export interface ResourceDisplayOptions {
  detailed: boolean;
  maxLength: number;
}

/**
 * Summary of added / removed / modified resources, optionally followed by
 * each modified resource's attribute changes.
 */
export function displayResourceComparison(
  comparison: ResourceComparison,
  ui: TerminalUI,
  options: ResourceDisplayOptions
): void {
  const drifted = comparison.added.length + comparison.removed.length + comparison.modified.size;

  ui.section('Terraform Drift Summary');
  ui.print(`  Unchanged resources: ${comparison.unchanged.length}`);
  ui.print(`  Drifted resources:   ${drifted}`);

  if (drifted === 0) {
    ui.newLine();
    ui.print('  No drift detected. Infrastructure is in sync.');
    return;
  }

  if (comparison.added.length > 0) {
    ui.newLine();
    ui.print(`Added (${comparison.added.length}):`);
    for (const address of comparison.added) {
      ui.print(`  ${ui.color('+', 'green')} ${address}`);
    }
  }

  if (comparison.removed.length > 0) {
    ui.newLine();
    ui.print(`Removed (${comparison.removed.length}):`);
    for (const address of comparison.removed) {
      ui.print(`  ${ui.color('-', 'red')} ${address}`);
    }
  }

  if (comparison.modified.size > 0) {
    ui.newLine();
    ui.print(`Modified (${comparison.modified.size}):`);
    for (const [address, result] of comparison.modified) {
      ui.print(`  ${ui.color('~', 'yellow')} ${address}`);
      if (options.detailed) {
        displayDiff(result, ui, options.maxLength, '      ');
      }
    }
  }
}
