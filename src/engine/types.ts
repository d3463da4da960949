/**
 * Drift Engine Types
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonType = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

export type DiffKind = 'added' | 'removed' | 'changed' | 'type_changed';

/** Object keys and array indices leading from the document root */
export type DiffPath = Array<string | number>;

export interface DiffEntry {
  kind: DiffKind;
  path: DiffPath;
  /** Value in the first (state) document; absent for `added` */
  oldValue?: JsonValue;
  /** Value in the second (plan) document; absent for `removed` */
  newValue?: JsonValue;
}

export interface DiffResult {
  entries: DiffEntry[];
  counts: Record<DiffKind, number>;
}

export interface DiffOptions {
  /** Compare arrays as multisets rather than sequences */
  ignoreOrder?: boolean;
}

export interface ResourceSnapshot {
  address: string;
  type: string;
  name: string;
  values: JsonValue;
}

export type ResourceSource =
  | 'planned_values'
  | 'values'
  | 'resources'
  | 'resource_changes'
  | 'none';

export interface ExtractedResources {
  source: ResourceSource;
  resources: Map<string, ResourceSnapshot>;
}

export interface ResourceComparison {
  added: string[];
  removed: string[];
  modified: Map<string, DiffResult>;
  unchanged: string[];
}
