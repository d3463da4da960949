/**
 * Structural Diff
 *
 * Thin policy layer over microdiff. microdiff walks two containers and
 * reports CREATE / REMOVE / CHANGE records; this module decides how arrays
 * are ordered before the walk, handles non-container roots (which microdiff
 * does not accept), and classifies changes whose JSON type differs.
 */

import diff from 'microdiff';

import type {
  DiffEntry,
  DiffKind,
  DiffOptions,
  DiffPath,
  DiffResult,
  JsonObject,
  JsonType,
  JsonValue,
} from './types';

export function jsonTypeOf(value: JsonValue): JsonType {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return jsonTypeOf(value) === 'object';
}

/**
 * JSON text with object keys sorted, so equal values always serialise the
 * same way regardless of key insertion order.
 */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const members = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Recursively sort every array by the stable text of its elements.
 */
export function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value
      .map(canonicalize)
      .map(item => ({ item, key: stableStringify(item) }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .map(({ item }) => item);
  }
  if (isJsonObject(value)) {
    // fromEntries defines own keys, so a `__proto__` member stays a member
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, canonicalize(entry)])
    );
  }
  return value;
}

// microdiff tests membership with `in`, which also sees Object.prototype
// members such as `constructor`. Keys are prefixed for the walk and the
// prefix is stripped from every path and value it reports.
const KEY_PREFIX = '$';

function escapeContainer(value: JsonValue[] | JsonObject): JsonValue[] | JsonObject {
  if (Array.isArray(value)) {
    return value.map(escapeKeys);
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [`${KEY_PREFIX}${key}`, escapeKeys(entry)])
  );
}

function escapeKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value) || isJsonObject(value)) {
    return escapeContainer(value);
  }
  // -0 and 0 are the same JSON number
  return value === 0 ? 0 : value;
}

function restoreKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(restoreKeys);
  }
  if (isJsonObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key.slice(KEY_PREFIX.length), restoreKeys(entry)])
    );
  }
  return value;
}

function restorePath(path: Array<string | number>): DiffPath {
  return path.map(segment =>
    typeof segment === 'string' ? segment.slice(KEY_PREFIX.length) : segment
  );
}

function emptyCounts(): Record<DiffKind, number> {
  return { added: 0, removed: 0, changed: 0, type_changed: 0 };
}

function changeEntry(path: DiffPath, oldValue: JsonValue, newValue: JsonValue): DiffEntry {
  const kind: DiffKind = jsonTypeOf(oldValue) === jsonTypeOf(newValue) ? 'changed' : 'type_changed';
  return { kind, path, oldValue, newValue };
}

function containerEntries(before: JsonValue[] | JsonObject, after: JsonValue[] | JsonObject): DiffEntry[] {
  return diff(escapeContainer(before), escapeContainer(after)).map((difference): DiffEntry => {
    const path = restorePath(difference.path);
    switch (difference.type) {
      case 'CREATE':
        return { kind: 'added', path, newValue: restoreKeys(difference.value) };
      case 'REMOVE':
        return { kind: 'removed', path, oldValue: restoreKeys(difference.oldValue) };
      case 'CHANGE':
        return changeEntry(path, restoreKeys(difference.oldValue), restoreKeys(difference.value));
    }
  });
}

/**
 * Compute the structural difference between two parsed JSON documents.
 * Identical documents yield no entries.
 */
export function computeDiff(
  before: JsonValue,
  after: JsonValue,
  options: DiffOptions = {}
): DiffResult {
  const left = options.ignoreOrder ? canonicalize(before) : before;
  const right = options.ignoreOrder ? canonicalize(after) : after;

  let entries: DiffEntry[];
  if (Array.isArray(left) && Array.isArray(right)) {
    entries = containerEntries(left, right);
  } else if (isJsonObject(left) && isJsonObject(right)) {
    entries = containerEntries(left, right);
  } else if (stableStringify(left) === stableStringify(right)) {
    entries = [];
  } else {
    entries = [changeEntry([], left, right)];
  }

  const counts = emptyCounts();
  for (const entry of entries) {
    counts[entry.kind]++;
  }
  return { entries, counts };
}

export function hasDrift(result: DiffResult): boolean {
  return result.entries.length > 0;
}
